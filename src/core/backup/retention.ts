/**
 * Retention policy logic
 */

import type { BackupRecord, CleanupCandidate, RetentionPolicy } from "../../types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Newest first. Ties on timestamp fall back to the id, also descending, with
 * digit runs compared as numbers so `_10` sorts above `_9`.
 */
export function sortNewestFirst(backups: BackupRecord[]): BackupRecord[] {
  return [...backups].sort((a, b) => {
    const diff = Date.parse(b.timestamp) - Date.parse(a.timestamp);
    if (diff !== 0) return diff;
    return b.backup_id.localeCompare(a.backup_id, undefined, { numeric: true });
  });
}

/**
 * Get backups eligible for cleanup. A backup survives only when it is
 * both among the newest `maxBackups` and newer than `now - retentionDays`.
 */
export function getCleanupCandidates(
  backups: BackupRecord[],
  policy: RetentionPolicy,
  now: Date = new Date(),
): CleanupCandidate[] {
  const candidates: CleanupCandidate[] = [];
  const cutoff = now.getTime() - policy.retentionDays * DAY_MS;

  sortNewestFirst(backups).forEach((backup, index) => {
    if (index >= policy.maxBackups) {
      candidates.push({ backup, reason: "retention_count" });
    } else if (!(Date.parse(backup.timestamp) > cutoff)) {
      candidates.push({ backup, reason: "retention_days" });
    }
  });

  return candidates;
}
