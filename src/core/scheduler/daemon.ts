/**
 * Watchdog daemon
 *
 * Each tick: take a scheduled backup if the cron fires this minute, probe
 * every service, feed the batch to the monitor, and run the recovery
 * playbook when the monitor triggers.
 */

import type { RecoveryAction } from "../../types";
import { scoped } from "../../utils/logger";
import type { BackupStore } from "../backup/store";
import { collectServiceHealth } from "../monitor/health-collector";
import type { RecoveryMonitor } from "../monitor/recovery-monitor";
import type { ServiceRecovery } from "../services/orchestrator";
import { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";

const log = scoped("watchdog");

export interface WatchdogOptions {
  store: BackupStore;
  monitor: RecoveryMonitor;
  services: ServiceRecovery;
  intervalSeconds: number;
  /** Cron expression for scheduled backups */
  schedule?: string;
  /** Run the playbook live instead of dry-run when recovery triggers */
  autoRestart?: boolean;
}

export interface WatchdogStatus {
  running: boolean;
  intervalSeconds: number;
  schedule: string | null;
  lastBackup: Date | null;
  nextBackup: Date | null;
  lastAction: RecoveryAction | null;
}

export class Watchdog {
  private readonly cron: ParsedCron | null;
  private running = false;
  private ticking = false;
  private checkInterval: NodeJS.Timeout | null = null;
  private lastBackup: Date | null = null;
  private lastAction: RecoveryAction | null = null;

  constructor(private readonly options: WatchdogOptions) {
    this.cron = options.schedule ? parseCron(options.schedule) : null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      log.warn("Watchdog is already running");
      return;
    }

    this.running = true;
    log.info(`Watchdog started, checking every ${this.options.intervalSeconds}s`);

    this.runTick();

    this.checkInterval = setInterval(() => {
      this.runTick();
    }, this.options.intervalSeconds * 1000);
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }

    log.info("Watchdog stopped");
  }

  /**
   * One watchdog pass. Returns the monitor's decision for this batch.
   */
  async tick(now: Date = new Date()): Promise<RecoveryAction> {
    await this.maybeBackup(now);

    const health = await collectServiceHealth(this.options.services);
    const action = await this.options.monitor.checkAndRecover(health);
    this.lastAction = action;

    if (action.action === "recovery_initiated") {
      const failed = Object.entries(health)
        .filter(([, healthy]) => !healthy)
        .map(([name]) => name);

      await this.options.services.runPlaybook(failed, {
        dryRun: !this.options.autoRestart,
      });

      log.warn(
        `To restore the latest recovery point run: lifeboat restore ${action.backupAvailable}`,
      );
    }

    return action;
  }

  getStatus(): WatchdogStatus {
    return {
      running: this.running,
      intervalSeconds: this.options.intervalSeconds,
      schedule: this.cron?.expression ?? null,
      lastBackup: this.lastBackup,
      nextBackup: this.cron ? getNextRun(this.cron) : null,
      lastAction: this.lastAction,
    };
  }

  private runTick(): void {
    // A slow tick is not overlapped by the next one
    if (this.ticking) {
      log.debug("Previous tick still running, skipping");
      return;
    }

    this.ticking = true;
    this.tick()
      .catch((error) => {
        log.error(`Watchdog tick failed: ${(error as Error).message}`);
      })
      .finally(() => {
        this.ticking = false;
      });
  }

  private async maybeBackup(now: Date): Promise<void> {
    if (!this.cron || !matchesCron(this.cron, now)) {
      return;
    }

    const minute = new Date(now);
    minute.setSeconds(0, 0);
    if (this.lastBackup && this.lastBackup.getTime() === minute.getTime()) {
      return;
    }
    this.lastBackup = minute;

    log.info(`Scheduled backup triggered (${this.cron.expression})`);
    const outcome = await this.options.store.createBackup("scheduled");
    if (outcome.status === "completed") {
      log.info(`Scheduled backup completed: ${outcome.backup_id}`);
    } else {
      log.error(`Scheduled backup failed: ${outcome.error}`);
    }
  }
}
