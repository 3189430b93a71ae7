#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanupCommand } from "./cli/commands/cleanup";
import { historyCommand } from "./cli/commands/history";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { rollbackCommand } from "./cli/commands/rollback";
import { servicesCommand } from "./cli/commands/services";
import { startCommand } from "./cli/commands/start";
import { statusCommand } from "./cli/commands/status";
import { verifyCommand } from "./cli/commands/verify";
import { NAME, VERSION } from "./cli/ui";
import { isLogLevel, setLogLevel } from "./utils/logger";

function printHelp(): void {
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} - Backups and guarded recovery`);

  p.note(
    `${color.cyan("start")}       Start the watchdog daemon
${color.cyan("backup")}      Create a backup
${color.cyan("list")}        List existing backups
${color.cyan("verify")}      Verify backup integrity
${color.cyan("cleanup")}     Clean up old backups based on retention policy
${color.cyan("restore")}     Restore a backup (takes a safety backup first)
${color.cyan("status")}      Show recovery readiness and service liveness
${color.cyan("services")}    Check services, run the recovery playbook
${color.cyan("history")}     Show recent revisions
${color.cyan("rollback")}    Check out an earlier revision`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `lifeboat backup                   ${color.dim("# Back up critical paths")}
lifeboat verify --all             ${color.dim("# Verify all backups")}
lifeboat restore <id>             ${color.dim("# Restore a backup")}
lifeboat services --recover       ${color.dim("# Preview the recovery playbook")}
lifeboat start                    ${color.dim("# Run the watchdog")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("lifeboat <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`${NAME} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  const envLevel = process.env.LIFEBOAT_LOG_LEVEL;
  if (envLevel && isLogLevel(envLevel)) {
    setLogLevel(envLevel);
  }

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "status":
      return statusCommand(commandArgs);

    case "services":
      return servicesCommand(commandArgs);

    case "history":
      return historyCommand(commandArgs);

    case "rollback":
      return rollbackCommand(commandArgs);

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
      console.error(`Run ${color.cyan("lifeboat --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
