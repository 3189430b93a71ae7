/**
 * Core module exports
 */

// Backup
export {
  BackupStore,
  type BackupStoreOptions,
  type CreateBackupOptions,
  createArchive,
  extractArchive,
  getCleanupCandidates,
  sortNewestFirst,
} from "./backup";

// Restore
export { type Extractor, RestoreEngine } from "./restore";

// Monitor
export { collectServiceHealth, DEFAULT_FAILURE_THRESHOLD, RecoveryMonitor } from "./monitor";

// Services
export {
  type IntentExecutor,
  type PortProbe,
  ServiceRecovery,
  ShellIntentExecutor,
  TcpPortProbe,
} from "./services";

// Rollback
export {
  GitVersionControl,
  RollbackManager,
  type VersionControl,
  VersionControlError,
} from "./rollback";

// Scheduler
export { getNextRun, matchesCron, parseCron, Watchdog } from "./scheduler";

export { createRuntime, type Runtime, type RuntimeOverrides } from "./runtime";
