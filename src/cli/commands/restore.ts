import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      target: { type: "string", short: "t" },
      force: { type: "boolean", default: false },
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

  const [backupId] = positionals;
  if (!backupId || positionals.length > 1) {
    ui.error("Specify exactly one backup ID to restore");
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config);
    const runtime = createRuntime(config);
    const target = values.target ?? config.appRoot;

    ui.intro("restore");

    if (!values.force) {
      const prompt = `Restore ${backupId} into ${target}? Files in the archive will be overwritten.`;
      if (!(await ui.confirmAction(prompt))) {
        ui.cancel("Restore cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Verifying and restoring...");
    const result = await runtime.restore.restore(backupId, values.target);
    s.stop(result.success ? "Restore complete" : "Restore failed");

    if (result.success) {
      ui.note(
        formatSummary([
          { label: "Restored", value: result.backupId },
          { label: "Target", value: result.target },
          { label: "Safety backup", value: result.preRestoreBackupId },
        ]),
        "Restore Summary",
      );
      ui.info(`To undo, restore ${color.cyan(result.preRestoreBackupId)}`);
      ui.outro("Restore complete!");
      return 0;
    }

    switch (result.reason) {
      case "verification_failed":
        ui.error(`Backup ${backupId} failed verification; nothing was changed`);
        break;
      case "safety_backup_failed":
        ui.error(`Could not take the pre-restore backup (${result.error}); nothing was changed`);
        break;
      case "extraction_failed":
        ui.error(`Extraction failed: ${result.error}`);
        if (result.preRestoreBackupId) {
          ui.info(`The previous state was saved as ${color.cyan(result.preRestoreBackupId)}`);
        }
        break;
    }

    ui.outro("Restore failed");
    return 1;
  } catch (error) {
    ui.error(`Restore failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat restore")} - Restore a verified backup

${color.dim("USAGE:")}
  lifeboat restore <BACKUP_ID> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
  -t, --target <dir>      Extract here instead of the application root
      --force             Skip confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  The archive checksum is verified first. A pre_restore backup of the current
  state is then taken, and only then is the archive extracted over the
  target. Restoring the pre_restore backup undoes the restore.

${color.dim("EXAMPLES:")}
  lifeboat restore lifeboat_full_20240101_120000
  lifeboat restore lifeboat_full_20240101_120000 --target /tmp/inspect --force
`);
}
