/**
 * Cron expression handling for scheduled backups, on top of cron-parser.
 *
 * Standard 5-field format: minute hour day-of-month month day-of-week
 *
 *   "0 * * * *"      - Every hour at minute 0
 *   "0 0,12 * * *"   - Twice a day
 *   "30 2 * * *"     - Every day at 2:30 AM
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  // Throws on out-of-range values
  CronExpressionParser.parse(expression, timezone ? { tz: timezone } : undefined);
  return { expression, timezone };
}

/**
 * Whether the cron fires in the minute containing `date`.
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const minute = new Date(date);
  minute.setSeconds(0, 0);

  // The first fire time after the previous minute is this minute iff it matches
  const next = getNextRun(cron, new Date(minute.getTime() - 60_000));
  next.setSeconds(0, 0);

  return next.getTime() === minute.getTime();
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  const interval = CronExpressionParser.parse(cron.expression, {
    currentDate: fromDate,
    ...(cron.timezone ? { tz: cron.timezone } : {}),
  });
  return interval.next().toDate();
}
