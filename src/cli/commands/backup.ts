import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import { formatBytes, formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      type: { type: "string", short: "t", default: "full" },
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

    ui.intro("backup");

    const s = ui.spinner();
    s.start("Creating archive...");

    const startedAt = Date.now();
    const record = await store.createBackup(values.type);

    if (record.status === "failed") {
      s.stop("Archive not created");
      ui.error(`Backup failed: ${record.error}`);
      return 1;
    }

    s.stop("Archive created");

    ui.note(
      formatSummary([
        { label: "Backup ID", value: record.backup_id },
        { label: "Type", value: record.backup_type },
        { label: "Archive", value: record.path },
        { label: "Size", value: formatBytes(record.size_bytes) },
        {
          label: "Paths",
          value: record.files_included.length > 0 ? record.files_included.join(", ") : "(none)",
        },
        { label: "SHA-256", value: record.checksum_sha256 },
        { label: "Duration", value: formatDuration(Date.now() - startedAt) },
      ]),
      "Backup Summary",
    );

    if (record.files_included.length === 0) {
      ui.warn("None of the configured critical paths exist; the archive is empty");
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat backup")} - Create a backup of the critical paths

${color.dim("USAGE:")}
  lifeboat backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
  -t, --type <kind>       Backup kind recorded in the id (default: full)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Archives every configured critical path that exists into a gzip-compressed
  tar, records its SHA-256 in a sidecar metadata file, then applies the
  retention policy.

${color.dim("EXAMPLES:")}
  lifeboat backup                          # Full backup
  lifeboat backup -t pre_deploy            # Backup tagged as pre_deploy
`);
}
