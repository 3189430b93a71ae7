/**
 * Centralized type exports for Lifeboat
 */

// Backup types
export type {
  BackupKind,
  BackupOutcome,
  BackupRecord,
  CleanupCandidate,
  CleanupDeletion,
  CleanupReason,
  CleanupResult,
  FailedBackup,
  RecoveryStatus,
  RestoreResult,
  RetentionPolicy,
} from "./backup";
// Config types
export type {
  BackupConfig,
  LifeboatConfig,
  MonitorConfig,
  RecoveryConfig,
  RollbackConfig,
  ServiceConfig,
} from "./config";
// Recovery types
export type { HealthResults, RecoveryAction, RecoveryActionType } from "./recovery";
// Rollback types
export type { Revision, RollbackResult } from "./rollback";
// Service types
export type {
  IntentMode,
  PlaybookEntry,
  PlaybookResult,
  RestartIntent,
  RestartResult,
  ServiceDefinition,
  ServiceStatus,
  SkippedRestart,
} from "./services";
