import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config/loader";
import { createRuntime } from "../../core";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
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

    ui.intro("watchdog");

    const services = runtime.services.serviceNames;
    if (services.length === 0 && !config.backup.schedule) {
      ui.error("Nothing to watch");
      ui.info("Add services or a backup schedule to your config file");
      return 1;
    }

    const watchdog = runtime.createWatchdog();
    const status = watchdog.getStatus();

    ui.note(
      formatSummary([
        { label: "Services", value: services.length > 0 ? services.join(", ") : "(none)" },
        { label: "Interval", value: `${status.intervalSeconds}s` },
        { label: "Threshold", value: `${runtime.monitor.failureThreshold} consecutive failures` },
        {
          label: "Backups",
          value: status.schedule
            ? `${status.schedule} ${color.dim(`next: ${status.nextBackup?.toLocaleString() ?? "unknown"}`)}`
            : "not scheduled",
        },
        { label: "Restarts", value: config.recovery.autoRestart ? "live" : "dry-run" },
      ]),
      "Watchdog",
    );

    const shutdown = () => {
      ui.cancel("Shutting down...");
      watchdog.stop();
      process.exit(0);
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    watchdog.start();

    ui.success("Watchdog is running");
    ui.info("Press Ctrl+C to stop");

    // Keep the process running
    await new Promise(() => {});

    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("lifeboat start")} - Start the watchdog daemon

${color.dim("USAGE:")}
  lifeboat start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./lifeboat.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Probes every configured service each monitor.intervalSeconds. After
  monitor.failureThreshold consecutive failing checks it runs the recovery
  playbook (live only with recovery.autoRestart) and prints the newest
  recovery point. Restores are never automatic.

  When backup.schedule is set, a "scheduled" backup is taken whenever the
  cron expression fires.

${color.dim("SCHEDULE FORMAT:")}
  Standard cron format: minute hour day-of-month month day-of-week

    "0 * * * *"     - Every hour at minute 0
    "0 2 * * *"     - Every day at 2:00 AM

${color.dim("EXAMPLES:")}
  lifeboat start                           # Start with default config
  lifeboat start -c /etc/lifeboat.yaml     # Start with specific config
`);
}
