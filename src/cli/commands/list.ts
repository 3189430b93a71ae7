import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import type { BackupRecord } from "../../types";
import { formatBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const WIDTHS = [
  TABLE_WIDTHS.backupId,
  TABLE_WIDTHS.type,
  TABLE_WIDTHS.created,
  TABLE_WIDTHS.size,
  TABLE_WIDTHS.paths,
];

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      type: { type: "string", short: "t" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
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

    let backups = await store.listBackups();

    if (values.type) {
      backups = backups.filter((b) => b.backup_type === values.type);
    }

    const limit = values.limit ? parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      backups = backups.slice(0, limit);
    }

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(backups, null, 2));
        return 0;
      case "table":
        break;
      default:
        ui.error(`Unknown format: ${values.format}`);
        return 1;
    }

    ui.intro("list");

    if (backups.length === 0) {
      ui.info("No backups found");
      ui.outro("Done");
      return 0;
    }

    printTable(backups);

    ui.outro(`${backups.length} backup(s) total`);
    return 0;
  } catch (error) {
    ui.error(`List failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(backups: BackupRecord[]): void {
  ui.step("Backups:");
  console.log(formatTableRow(["ID", "Type", "Created", "Size", "Paths"], WIDTHS));
  console.log(formatTableSeparator(WIDTHS));

  for (const backup of backups) {
    const typeLabel =
      backup.backup_type === "pre_restore" ? color.yellow(backup.backup_type) : backup.backup_type;

    console.log(
      formatTableRow(
        [
          backup.backup_id,
          typeLabel,
          backup.timestamp.substring(0, 19),
          formatBytes(backup.size_bytes),
          String(backup.files_included.length),
        ],
        WIDTHS,
      ),
    );
  }

  console.log(formatTableSeparator(WIDTHS));
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat list")} - List existing backups, newest first

${color.dim("USAGE:")}
  lifeboat list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
  -t, --type <kind>       Only backups of this kind
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  lifeboat list                            # List all backups
  lifeboat list -t pre_restore             # Safety backups taken before restores
  lifeboat list -n 5                       # Five newest backups
  lifeboat list --format json              # Output as JSON (for scripting)
`);
}
