import { parseArgs } from "node:util";
import { DEFAULT_NAMESPACE } from "../../config/manifest";
import { policyKey } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { openContext } from "../context";
import { color, ui } from "../ui";

export async function deleteCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      namespace: { type: "string", short: "n" },
      config: { type: "string", short: "c" },
      yes: { type: "boolean", short: "y", default: false },
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
  const key = policyKey(id);

  try {
    const ctx = await openContext(values.config);
    try {
      const policy = await ctx.store.get(id);
      if (!policy) {
        ui.error(`backuppolicy "${key}" not found`);
        return 1;
      }

      if (!values.yes) {
        const confirmed = await ui.confirm({
          message: `Delete backuppolicy ${key} and its backup job containers?`,
          initialValue: false,
        });

        if (ui.isCancel(confirmed) || !confirmed) {
          ui.cancel("Delete cancelled");
          return 1;
        }
      }

      await ctx.store.delete(id);
      console.log(`backuppolicy/${key} deleted`);

      try {
        const removed = await ctx.jobs.deleteOwnedJobs(policy);
        if (removed.length > 0) {
          ui.info(`Removed ${removed.length} job container(s): ${removed.join(", ")}`);
        }
      } catch (error) {
        ui.warn(`Could not remove job containers for ${key}: ${(error as Error).message}`);
      }
    } finally {
      ctx.close();
    }

    return 0;
  } catch (error) {
    ui.error(`Delete failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-controller delete")} - Delete a backup policy

${color.dim("USAGE:")}
  backup-controller delete <name> [OPTIONS]

${color.dim("OPTIONS:")}
  -n, --namespace <ns>    Namespace (default: default)
  -c, --config <path>     Path to config file (default: ./backup-controller.config.yaml)
  -y, --yes               Skip confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Removes the policy from the store, then removes every job container
  labelled with the policy's uid.

${color.dim("EXAMPLES:")}
  backup-controller delete nightly             # Delete with confirmation
  backup-controller delete nightly -n prod -y  # Delete without confirmation
`);
}
