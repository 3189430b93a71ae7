/**
 * Backup operation type definitions
 */

/** Kind of backup, e.g. "full", "config", "incremental", "pre_restore" */
export type BackupKind = string;

/**
 * One archive and its sidecar. Field names follow the on-disk
 * `{backup_id}_metadata.json` layout.
 */
export interface BackupRecord {
  backup_id: string;
  backup_type: BackupKind;
  /** ISO-8601 UTC with trailing Z */
  timestamp: string;
  /** Absolute path of the .tar.gz archive */
  path: string;
  size_bytes: number;
  checksum_sha256: string;
  /** Configured critical paths that existed and went into the archive */
  files_included: string[];
  status: "completed";
}

/**
 * A backup that could not be written. Nothing is left on disk for it.
 */
export interface FailedBackup {
  /** Null when the requested kind could not form an id */
  backup_id: string | null;
  backup_type: BackupKind;
  timestamp: string;
  status: "failed";
  error: string;
}

export type BackupOutcome = BackupRecord | FailedBackup;

export interface RetentionPolicy {
  retentionDays: number;
  maxBackups: number;
}

export type CleanupReason = "retention_count" | "retention_days";

export interface CleanupCandidate {
  backup: BackupRecord;
  reason: CleanupReason;
}

export interface CleanupDeletion {
  backupId: string;
  reason: CleanupReason;
  success: boolean;
  error?: string;
}

export interface CleanupResult {
  totalChecked: number;
  totalDeleted: number;
  deletions: CleanupDeletion[];
}

export interface RecoveryStatus {
  status: "healthy" | "no_backups";
  totalBackups: number;
  latestBackup: BackupRecord | null;
  oldestBackup: BackupRecord | null;
  backupDir: string;
  retention: RetentionPolicy;
  lastChecked: string;
}

export type RestoreResult =
  | {
      success: true;
      backupId: string;
      preRestoreBackupId: string;
      target: string;
    }
  | {
      success: false;
      backupId: string;
      reason: "verification_failed";
    }
  | {
      success: false;
      backupId: string;
      reason: "safety_backup_failed" | "extraction_failed";
      error: string;
      preRestoreBackupId: string | null;
      target: string;
    };
