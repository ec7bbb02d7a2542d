import { parseArgs } from "node:util";
import { loadManifests } from "../../config/manifest";
import { policyKey } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { openContext } from "../context";
import { color, ui } from "../ui";

export async function applyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      file: { type: "string", short: "f" },
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  if (!values.file) {
    ui.error("A manifest file is required (-f <file>)");
    return 1;
  }

  try {
    const manifests = await loadManifests(values.file);
    if (manifests.length === 0) {
      ui.warn(`No policies found in ${values.file}`);
      return 0;
    }

    const ctx = await openContext(values.config);
    try {
      for (const manifest of manifests) {
        const { policy, action } = await ctx.store.apply(manifest);
        console.log(`backuppolicy/${policyKey(policy)} ${action}`);
      }
    } finally {
      ctx.close();
    }

    return 0;
  } catch (error) {
    ui.error(`Apply failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-controller apply")} - Create or update backup policies

${color.dim("USAGE:")}
  backup-controller apply -f <file> [OPTIONS]

${color.dim("OPTIONS:")}
  -f, --file <path>       YAML or JSON manifest (YAML may hold several documents)
  -c, --config <path>     Path to config file (default: ./backup-controller.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Each policy is reported as created, configured (its spec changed) or
  unchanged. Status is never touched by apply.

${color.dim("EXAMPLES:")}
  backup-controller apply -f policy.yaml
  backup-controller apply -f policies.yaml -c /etc/backup-controller.yaml
`);
}
