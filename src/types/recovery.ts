/**
 * Health signal and recovery decision types
 */

/** check name -> healthy? */
export type HealthResults = Record<string, boolean>;

export type RecoveryAction =
  | { action: "none"; reason: "all_services_healthy" }
  | { action: "monitoring"; failures: string[]; count: number }
  | {
      action: "recovery_initiated";
      backupAvailable: string;
      timestamp: string;
      requiresManualConfirmation: true;
    }
  | { action: "recovery_failed"; reason: "no_backups_available" };

export type RecoveryActionType = RecoveryAction["action"];
