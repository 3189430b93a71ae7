import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime, getCleanupCandidates } from "../../core";
import type { CleanupReason } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

function describeReason(reason: CleanupReason): string {
  return reason === "retention_count" ? "count limit" : "age limit";
}

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
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

  try {
    const config = await findAndLoadConfig(values.config);
    const { store } = createRuntime(config);

    ui.intro("cleanup");

    // Preview what will be deleted first
    const preview = getCleanupCandidates(await store.listBackups(), store.retention, new Date());

    if (preview.length === 0) {
      ui.success("No backups need to be cleaned up");
      ui.outro("Nothing to do");
      return 0;
    }

    ui.step(`Found ${preview.length} backup(s) to delete:`);
    for (const { backup, reason } of preview) {
      ui.message(`  ${color.dim("•")} ${backup.backup_id} ${color.dim(`(${describeReason(reason)})`)}`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Dry run complete");
      return 0;
    }

    if (!values.force) {
      if (!(await ui.confirmAction(`Delete ${preview.length} backup(s)?`))) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Deleting old backups...");
    const result = await store.cleanup();
    s.stop("Cleanup complete");

    const failures = result.deletions.filter((d) => !d.success);
    for (const failure of failures) {
      ui.error(`${failure.backupId}: ${failure.error ?? "unknown error"}`);
    }

    ui.note(
      formatSummary([
        { label: "Checked", value: result.totalChecked },
        { label: "Deleted", value: result.totalDeleted },
        { label: "Failed", value: failures.length > 0 ? failures.length : null },
      ]),
      "Cleanup Summary",
    );

    if (failures.length > 0) {
      ui.outro("Cleanup finished with errors");
      return 1;
    }

    ui.outro("Cleanup complete!");
    return 0;
  } catch (error) {
    ui.error(`Cleanup failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat cleanup")} - Apply the retention policy

${color.dim("USAGE:")}
  lifeboat cleanup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
      --dry-run           Show what would be deleted without deleting
      --force             Skip confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("RETENTION POLICY:")}
  A backup is kept only while it is among the newest retention.maxBackups
  AND younger than retention.retentionDays. Everything else is deleted.

${color.dim("EXAMPLES:")}
  lifeboat cleanup --dry-run               # Preview
  lifeboat cleanup --force                 # Delete without confirmation
`);
}
