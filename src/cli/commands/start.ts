import { parseArgs } from "node:util";
import { Controller } from "../../core";
import { getDockerVersion, isDockerAvailable } from "../../docker";
import { formatDuration, formatTimestamp } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { type CliContext, openContext } from "../context";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
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

  let ctx: CliContext | undefined;
  let controller: Controller | undefined;

  try {
    ctx = await openContext(values.config);
    const settings = ctx.config.controller;

    ui.banner("start");

    if (await isDockerAvailable()) {
      ui.info(`Docker ${(await getDockerVersion()) ?? "version unknown"}`);
    } else {
      ui.warn("Docker is not reachable; job creation will fail until it is");
    }

    controller = new Controller({
      store: ctx.store,
      reconciler: ctx.reconciler,
      watchIntervalMs: settings.watchInterval * 1000,
      maxConcurrentReconciles: settings.maxConcurrentReconciles,
      backoffBaseMs: settings.backoff.base * 1000,
      backoffMaxMs: settings.backoff.max * 1000,
    });

    const stopped = new Promise<void>((resolve) => {
      const shutdown = () => {
        ui.cancel("Shutting down...");
        resolve();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    await controller.start();

    const policies = await ctx.store.list();
    ui.step(`Watching ${policies.length} polic${policies.length === 1 ? "y" : "ies"}:`);
    for (const policy of policies) {
      ui.message(
        `  ${color.cyan(`${policy.namespace}/${policy.name}`.padEnd(32))} ${color.dim(policy.spec.schedule.padEnd(15))} ${color.dim("next:")} ${formatTimestamp(policy.status.nextScheduledBackupAt)}`,
      );
    }

    ui.success(`Controller is running (polling every ${formatDuration(settings.watchInterval * 1000)})`);
    ui.info("Press Ctrl+C to stop");

    await stopped;
    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  } finally {
    if (controller) {
      await stopController(controller);
    }
    ctx?.close();
  }
}

/**
 * Stop scheduling passes and wait for the running ones, which still write
 * through the store
 */
export async function stopController(controller: Pick<Controller, "stop" | "drained">): Promise<void> {
  controller.stop();
  await controller.drained();
}

function printHelp(): void {
  console.log(`
${color.bold("backup-controller start")} - Run the controller

${color.dim("USAGE:")}
  backup-controller start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-controller.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Watches the policy store and keeps one backup job per due policy running as a
  Docker container. Each policy is reconciled when it is created or changed,
  while its job runs, and when its next scheduled backup comes due.

${color.dim("SCHEDULE FORMAT:")}
  Schedules use standard cron format: minute hour day-of-month month day-of-week

  Examples:
    "0 * * * *"     - Every hour at minute 0
    "0 2 * * *"     - Every day at 2:00 AM
    "0 3 * * 0"     - Every Sunday at 3:00 AM
    "*/15 * * * *"  - Every 15 minutes

${color.dim("EXAMPLES:")}
  backup-controller start                                  # Start with default config
  backup-controller start -c /etc/backup-controller.yaml   # Start with specific config
  backup-controller start -v                               # Start with verbose logging
`);
}
