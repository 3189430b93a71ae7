import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import { DEFAULT_HISTORY_COUNT } from "../../core/rollback";
import { setLogLevel } from "../../utils/logger";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const WIDTHS = [TABLE_WIDTHS.revision, TABLE_WIDTHS.date, 50];

export async function historyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
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

  const count = values.limit ? parseInt(values.limit, 10) : DEFAULT_HISTORY_COUNT;
  if (!Number.isInteger(count) || count < 1) {
    ui.error(`Invalid limit: ${values.limit}`);
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config);
    const { rollback } = createRuntime(config);

    const revisions = await rollback.history(count);

    if (values.format === "json") {
      console.log(JSON.stringify(revisions, null, 2));
      return 0;
    }

    ui.intro("history");

    if (revisions.length === 0) {
      ui.info("No revisions found");
      ui.outro("Done");
      return 0;
    }

    ui.step("Revisions:");
    console.log(formatTableRow(["Revision", "Date", "Message"], WIDTHS));
    console.log(formatTableSeparator(WIDTHS));
    for (const rev of revisions) {
      console.log(formatTableRow([rev.revision.substring(0, 12), rev.date, rev.message], WIDTHS));
    }

    ui.outro(`${revisions.length} revision(s)`);
    return 0;
  } catch (error) {
    ui.error(`History failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat history")} - Show recent revisions of the application repository

${color.dim("USAGE:")}
  lifeboat history [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
  -n, --limit <number>    Number of revisions (default: ${DEFAULT_HISTORY_COUNT})
      --format <format>   Output format: table, json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
