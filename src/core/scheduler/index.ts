export { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";
export { Watchdog, type WatchdogOptions, type WatchdogStatus } from "./daemon";
