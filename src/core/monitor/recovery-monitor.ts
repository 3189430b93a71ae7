/**
 * Consecutive-failure monitor.
 *
 * Normal (count 0) -> Alerting (0 < count < threshold) -> trigger, back to
 * Normal. One call is one batch of health results; any false entry makes
 * the batch a failure. A trigger only proposes a restore point, it never
 * restores.
 */

import type { BackupRecord, HealthResults, RecoveryAction } from "../../types";
import { scoped } from "../../utils/logger";

const log = scoped("monitor");

export const DEFAULT_FAILURE_THRESHOLD = 3;

/** Where the monitor looks for the newest recovery point */
export interface RecoveryPointSource {
  /** Newest first */
  listBackups(): Promise<BackupRecord[]>;
}

export interface RecoveryMonitorOptions {
  failureThreshold?: number;
  now?: () => Date;
}

export class RecoveryMonitor {
  readonly failureThreshold: number;
  private count = 0;
  private readonly now: () => Date;

  constructor(
    private readonly source: RecoveryPointSource,
    options: RecoveryMonitorOptions = {},
  ) {
    const threshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new Error(`failureThreshold must be a positive integer, got ${threshold}`);
    }
    this.failureThreshold = threshold;
    this.now = options.now ?? (() => new Date());
  }

  get failureCount(): number {
    return this.count;
  }

  reset(): void {
    this.count = 0;
  }

  async checkAndRecover(results: HealthResults): Promise<RecoveryAction> {
    const failures = Object.entries(results)
      .filter(([, healthy]) => !healthy)
      .map(([name]) => name);

    if (failures.length === 0) {
      this.count = 0;
      return { action: "none", reason: "all_services_healthy" };
    }

    this.count++;
    log.warn(
      `Health check failures detected: ${failures.join(", ")} (${this.count}/${this.failureThreshold})`,
    );

    if (this.count >= this.failureThreshold) {
      return this.triggerRecovery();
    }

    return { action: "monitoring", failures, count: this.count };
  }

  private async triggerRecovery(): Promise<RecoveryAction> {
    log.error("RECOVERY TRIGGERED: too many consecutive failures");
    this.count = 0;

    const [latest] = await this.source.listBackups();
    if (!latest) {
      log.error("No backups available to recover from");
      return { action: "recovery_failed", reason: "no_backups_available" };
    }

    log.info(`Recovery point available: ${latest.backup_id}, awaiting manual confirmation`);

    return {
      action: "recovery_initiated",
      backupAvailable: latest.backup_id,
      timestamp: this.now().toISOString(),
      requiresManualConfirmation: true,
    };
  }
}
