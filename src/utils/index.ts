/**
 * Utility exports
 */

// Crypto utilities
export {
  CHECKSUM_BLOCK_SIZE,
  computeFileChecksum,
  generateShortId,
  verifyFileChecksum,
} from "./crypto";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel, ScopedLogger } from "./logger";
// Logger
export {
  debug,
  error,
  formatMessage,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  scoped,
  setLogLevel,
  warn,
} from "./logger";
// Naming utilities
export {
  archiveFileName,
  DEFAULT_PREFIX,
  formatCompactTimestamp,
  generateBackupId,
  generateRollbackBranchName,
  isSafeBackupId,
  isValidBackupKind,
  metadataFileName,
} from "./naming";
// Path utilities
export { hasExcludedSegment, isPathWithinDir } from "./path";
export { SerialQueue } from "./serial-queue";
