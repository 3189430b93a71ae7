/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { PlaybookEntry, RecoveryAction, RollbackResult } from "../../types";

export const TABLE_WIDTHS = {
  backupId: 40,
  type: 12,
  created: 19,
  size: 12,
  paths: 6,
  service: 16,
  port: 6,
  state: 10,
  revision: 12,
  date: 25,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * One line describing a monitor decision
 */
export function describeRecoveryAction(action: RecoveryAction): string {
  switch (action.action) {
    case "none":
      return "All services healthy";
    case "monitoring":
      return `Failing: ${action.failures.join(", ")} (consecutive failures: ${action.count})`;
    case "recovery_initiated":
      return `Recovery initiated, latest recovery point: ${action.backupAvailable}`;
    case "recovery_failed":
      return "Recovery failed: no backups available";
  }
}

export function describePlaybookEntry(entry: PlaybookEntry): string {
  switch (entry.action) {
    case "skipped":
      return `${entry.service}: skipped (already running)`;
    case "restart_failed":
      return `${entry.service}: restart failed (${entry.error})`;
    case "restart":
      if (entry.dryRun) {
        return `${entry.service}: ${entry.message}`;
      }
      return `${entry.service}: ${entry.runningAfter ? "restarted" : "started but not listening"}`;
  }
}

export function describeRollback(result: RollbackResult): string {
  switch (result.status) {
    case "planned":
      return result.message;
    case "rolled_back":
      return `Checked out ${result.revision}, previous state saved as ${result.backupBranch}`;
    case "failed":
      return `Rollback to ${result.revision} failed: ${result.error}`;
  }
}
