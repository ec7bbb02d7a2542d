import { parseArgs } from "node:util";
import { DEFAULT_NAMESPACE } from "../../config/manifest";
import type { BackupPolicy } from "../../types";
import { formatTimestamp } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { openContext } from "../context";
import { color, formatPhase, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const WIDTHS = [
  TABLE_WIDTHS.namespace,
  TABLE_WIDTHS.name,
  TABLE_WIDTHS.schedule,
  TABLE_WIDTHS.status,
  TABLE_WIDTHS.lastSuccess,
  TABLE_WIDTHS.nextRun,
  TABLE_WIDTHS.activeJob,
];

export async function getCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      namespace: { type: "string", short: "n" },
      config: { type: "string", short: "c" },
      format: { type: "string", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  if (values.format !== "table" && values.format !== "json") {
    ui.error(`Unknown format "${values.format}". Use table or json`);
    return 1;
  }

  const name = positionals[0];

  try {
    const ctx = await openContext(values.config);
    let policies: BackupPolicy[];
    try {
      if (name) {
        const policy = await ctx.store.get({
          namespace: values.namespace ?? DEFAULT_NAMESPACE,
          name,
        });
        policies = policy ? [policy] : [];
      } else {
        const all = await ctx.store.list();
        policies = values.namespace ? all.filter((p) => p.namespace === values.namespace) : all;
      }
    } finally {
      ctx.close();
    }

    if (name && policies.length === 0) {
      ui.error(`backuppolicy "${name}" not found`);
      return 1;
    }

    if (values.format === "json") {
      console.log(JSON.stringify(name ? policies[0] : policies, null, 2));
      return 0;
    }

    if (policies.length === 0) {
      ui.info("No policies found");
      return 0;
    }

    printTable(policies);
    return 0;
  } catch (error) {
    ui.error(`Get failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(policies: BackupPolicy[]): void {
  console.log(
    formatTableRow(
      ["NAMESPACE", "NAME", "SCHEDULE", "STATUS", "LAST SUCCESS", "NEXT RUN", "ACTIVE JOB"],
      WIDTHS,
    ),
  );
  console.log(formatTableSeparator(WIDTHS));

  for (const policy of policies) {
    const { status } = policy;
    const schedule = policy.spec.suspend
      ? `${policy.spec.schedule} ${color.yellow("(suspended)")}`
      : policy.spec.schedule;

    console.log(
      formatTableRow(
        [
          policy.namespace,
          policy.name,
          schedule,
          formatPhase(status.lastBackupStatus),
          formatTimestamp(status.lastSuccessfulBackupAt),
          formatTimestamp(status.nextScheduledBackupAt),
          status.activeJobRef || "-",
        ],
        WIDTHS,
      ),
    );

    if (status.failureReason) {
      console.log(`  ${color.red(status.failureReason)}`);
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-controller get")} - Show backup policies and their status

${color.dim("USAGE:")}
  backup-controller get [name] [OPTIONS]

${color.dim("OPTIONS:")}
  -n, --namespace <ns>    Namespace (default: all namespaces, or "default" with a name)
  -c, --config <path>     Path to config file (default: ./backup-controller.config.yaml)
      --format <format>   Output format: table, json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  backup-controller get                        # List all policies
  backup-controller get nightly -n prod        # Show one policy
  backup-controller get --format json          # Output as JSON (for scripting)
`);
}
