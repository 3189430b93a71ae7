import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import { setLogLevel } from "../../utils/logger";
import {
  color,
  describePlaybookEntry,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  ui,
} from "../ui";

const WIDTHS = [TABLE_WIDTHS.service, TABLE_WIDTHS.port, TABLE_WIDTHS.state];

export async function servicesCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      recover: { type: "boolean", default: false },
      live: { type: "boolean", default: false },
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

  if (values.live && !values.recover) {
    ui.error("--live only applies together with --recover");
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config);
    const { services } = createRuntime(config);

    ui.intro("services");

    const statuses = await services.allStatuses();
    if (statuses.length === 0) {
      ui.info("No services configured");
      ui.outro("Done");
      return 0;
    }

    ui.step("Services:");
    console.log(formatTableRow(["Service", "Port", "State"], WIDTHS));
    console.log(formatTableSeparator(WIDTHS));

    const down: string[] = [];
    for (const status of statuses) {
      if (!status.known) continue;
      if (!status.running) down.push(status.service);
      console.log(
        formatTableRow(
          [
            status.service,
            String(status.port),
            status.running ? color.green("up") : color.red("down"),
          ],
          WIDTHS,
        ),
      );
    }

    if (!values.recover) {
      ui.outro(down.length > 0 ? `${down.length} service(s) down` : "All services up");
      return 0;
    }

    if (down.length === 0) {
      ui.success("Nothing to recover");
      ui.outro("Done");
      return 0;
    }

    if (values.live && !values.force) {
      if (!(await ui.confirmAction(`Run start commands for ${down.join(", ")}?`))) {
        ui.cancel("Recovery cancelled");
        return 1;
      }
    }

    const result = await services.runPlaybook(down, { dryRun: !values.live });

    ui.step(result.dryRun ? "Playbook [DRY RUN]:" : "Playbook:");
    for (const entry of result.results) {
      ui.message(`  ${color.dim("•")} ${describePlaybookEntry(entry)}`);
    }

    if (result.dryRun) {
      ui.warn("[DRY RUN] Nothing was started. Re-run with --live to execute.");
    }

    if (!result.overallSuccess) {
      ui.outro("Recovery finished with failures");
      return 1;
    }

    ui.outro("Recovery complete!");
    return 0;
  } catch (error) {
    ui.error(`Services failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat services")} - Check services and run the recovery playbook

${color.dim("USAGE:")}
  lifeboat services [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
      --recover           Run the playbook for every service that is down
      --live              Actually execute start commands (default: dry run)
      --force             Skip confirmation prompt for --live
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  lifeboat services                        # Liveness table
  lifeboat services --recover              # Show what would be started
  lifeboat services --recover --live       # Start the services that are down
`);
}
