import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import type { RecoveryStatus, ServiceStatus } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

export async function statusCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      format: { type: "string", default: "text" },
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
    const runtime = createRuntime(config);

    const recovery = await runtime.store.recoveryStatus();
    const services = await runtime.services.allStatuses();

    if (values.format === "json") {
      console.log(JSON.stringify({ recovery, services }, null, 2));
      return 0;
    }

    ui.intro("status");
    printRecovery(recovery);
    printServices(services);

    const down = services.filter((s) => !s.known || !s.running).length;
    ui.outro(down > 0 ? `${down} service(s) down` : "All good");
    return 0;
  } catch (error) {
    ui.error(`Status failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printRecovery(status: RecoveryStatus): void {
  const state = status.status === "healthy" ? color.green(status.status) : color.yellow(status.status);

  ui.note(
    formatSummary([
      { label: "Status", value: state },
      { label: "Backups", value: status.totalBackups },
      { label: "Latest", value: status.latestBackup?.backup_id ?? null },
      { label: "Oldest", value: status.oldestBackup?.backup_id ?? null },
      { label: "Directory", value: status.backupDir },
      {
        label: "Retention",
        value: `${status.retention.maxBackups} backups, ${status.retention.retentionDays} days`,
      },
    ]),
    "Recovery",
  );
}

function printServices(statuses: ServiceStatus[]): void {
  if (statuses.length === 0) {
    ui.info("No services configured");
    return;
  }

  ui.step("Services:");
  for (const status of statuses) {
    if (!status.known) {
      ui.message(`  ${color.red("?")} ${status.service} ${color.dim(status.error)}`);
      continue;
    }
    const mark = status.running ? color.green("●") : color.red("●");
    ui.message(`  ${mark} ${status.service.padEnd(16)} ${color.dim(`port ${status.port}`)}`);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat status")} - Show recovery readiness and service liveness

${color.dim("USAGE:")}
  lifeboat status [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
      --format <format>   Output format: text, json (default: text)
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
