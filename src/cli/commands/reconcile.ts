import { parseArgs } from "node:util";
import { DEFAULT_NAMESPACE } from "../../config/manifest";
import { policyKey } from "../../types";
import { formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { openContext } from "../context";
import { color, formatPhase, formatSummary, ui } from "../ui";

export async function reconcileCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      namespace: { type: "string", short: "n" },
      config: { type: "string", short: "c" },
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

  const name = positionals[0];
  if (!name) {
    ui.error("A policy name is required");
    return 1;
  }

  const id = { namespace: values.namespace ?? DEFAULT_NAMESPACE, name };

  try {
    const ctx = await openContext(values.config);
    try {
      ui.intro(`reconcile ${policyKey(id)}`);

      const result = await ctx.reconciler.reconcile(id);
      if (result.requeueAfterMs === null) {
        ui.error(`backuppolicy "${policyKey(id)}" not found`);
        return 1;
      }

      ui.note(
        formatSummary([
          { label: "Phase", value: formatPhase(result.phase) },
          { label: "Job created", value: result.jobCreated ?? "-" },
          { label: "Status written", value: result.statusWritten ? "yes" : "no" },
          { label: "Requeue after", value: formatDuration(result.requeueAfterMs) },
        ]),
        "Result",
      );
      ui.outro("Done");
    } finally {
      ctx.close();
    }

    return 0;
  } catch (error) {
    ui.error(`Reconcile failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-controller reconcile")} - Run one reconciliation pass

${color.dim("USAGE:")}
  backup-controller reconcile <name> [OPTIONS]

${color.dim("OPTIONS:")}
  -n, --namespace <ns>    Namespace (default: default)
  -c, --config <path>     Path to config file (default: ./backup-controller.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Observes the policy's active job, refreshes its next run and launches a
  backup job when one is due, exactly as the running controller would.

${color.dim("EXAMPLES:")}
  backup-controller reconcile nightly
  backup-controller reconcile nightly -n prod -v
`);
}
