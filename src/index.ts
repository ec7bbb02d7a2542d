#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../package.json";
import { applyCommand } from "./cli/commands/apply";
import { deleteCommand } from "./cli/commands/delete";
import { getCommand } from "./cli/commands/get";
import { reconcileCommand } from "./cli/commands/reconcile";
import { startCommand } from "./cli/commands/start";

const VERSION = pkg.version;

function printHelp(): void {
  p.intro(`${color.cyan("backup-controller")} ${color.dim(`v${VERSION}`)} - Scheduled database backups`);

  p.note(
    `${color.cyan("start")}       Run the controller
${color.cyan("apply")}       Create or update backup policies from a manifest
${color.cyan("get")}         Show policies and their backup status
${color.cyan("delete")}      Delete a policy and its job containers
${color.cyan("reconcile")}   Run one reconciliation pass for a policy`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `backup-controller start                     ${color.dim("# Run the controller")}
backup-controller apply -f policy.yaml      ${color.dim("# Create or update policies")}
backup-controller get                       ${color.dim("# List all policies")}
backup-controller reconcile nightly         ${color.dim("# Reconcile one policy now")}
backup-controller delete nightly -y         ${color.dim("# Delete without confirmation")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("backup-controller <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`backup-controller v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "apply":
      return applyCommand(commandArgs);

    case "get":
      return getCommand(commandArgs);

    case "delete":
      return deleteCommand(commandArgs);

    case "reconcile":
      return reconcileCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("backup-controller --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
