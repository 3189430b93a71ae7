/**
 * Backup and branch naming utilities
 */

import { generateShortId } from "./crypto";

export const DEFAULT_PREFIX = "lifeboat";

const BACKUP_KIND_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

// Anything that could escape the backup directory when used as a file name
const SAFE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export const METADATA_SUFFIX = "_metadata.json";
export const ARCHIVE_EXTENSION = ".tar.gz";

/**
 * UTC `YYYYMMDD_HHMMSS`
 */
export function formatCompactTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

export function isValidBackupKind(kind: string): boolean {
  return BACKUP_KIND_PATTERN.test(kind);
}

/**
 * `prefix_kind_YYYYMMDD_HHMMSS`, with `_<sequence>` appended from 2 on for
 * further backups of the same kind within one second.
 */
export function generateBackupId(
  kind: string,
  date: Date,
  prefix: string = DEFAULT_PREFIX,
  sequence: number = 1,
): string {
  const base = `${prefix}_${kind}_${formatCompactTimestamp(date)}`;
  return sequence > 1 ? `${base}_${sequence}` : base;
}

/**
 * Whether an id can be joined onto the backup directory without leaving it.
 */
export function isSafeBackupId(backupId: string): boolean {
  return SAFE_ID_PATTERN.test(backupId) && !backupId.includes("..");
}

export function archiveFileName(backupId: string): string {
  return `${backupId}${ARCHIVE_EXTENSION}`;
}

export function metadataFileName(backupId: string): string {
  return `${backupId}${METADATA_SUFFIX}`;
}

export function generateRollbackBranchName(date: Date): string {
  return `pre_rollback_${formatCompactTimestamp(date)}_${generateShortId()}`;
}
