import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      all: { type: "boolean", default: false },
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

  try {
    const config = await findAndLoadConfig(values.config);
    const { store } = createRuntime(config);

    ui.intro("verify");

    let ids: string[];
    if (positionals.length > 0) {
      ids = positionals;
    } else if (values.all) {
      ids = (await store.listBackups()).map((b) => b.backup_id);
    } else {
      ui.error("Specify backup IDs or use --all to verify all backups");
      return 1;
    }

    if (ids.length === 0) {
      ui.success("No backups to verify");
      ui.outro("Done");
      return 0;
    }

    const s = ui.spinner();
    s.start(`Verifying ${ids.length} backup(s)...`);

    const failed: string[] = [];
    for (const id of ids) {
      if (!(await store.verifyBackup(id))) {
        failed.push(id);
      }
    }

    s.stop("Verification complete");

    for (const id of ids) {
      if (failed.includes(id)) {
        ui.error(`${id} ${color.dim("(missing or checksum mismatch)")}`);
      } else {
        ui.success(id);
      }
    }

    ui.note(
      formatSummary([
        { label: "Verified", value: ids.length },
        { label: "Healthy", value: ids.length - failed.length },
        { label: "Failed", value: failed.length },
      ]),
      "Verification Summary",
    );

    if (failed.length > 0) {
      ui.outro("Verification found issues");
      return 1;
    }

    ui.outro("All backups verified!");
    return 0;
  } catch (error) {
    ui.error(`Verify failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat verify")} - Verify backup integrity

${color.dim("USAGE:")}
  lifeboat verify [BACKUP_ID...] [OPTIONS]
  lifeboat verify --all [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
      --all               Verify every backup in the backup directory
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Recomputes the SHA-256 of each archive and compares it with the checksum
  recorded in its metadata. A missing archive or metadata file fails.

${color.dim("EXAMPLES:")}
  lifeboat verify lifeboat_full_20240101_120000
  lifeboat verify --all
`);
}
