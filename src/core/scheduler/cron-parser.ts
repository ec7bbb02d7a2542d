/**
 * Cron schedule parsing using the cron-parser library
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 * * * *"      - Every hour at minute 0
 *   "0 1 * * *"      - Every day at 1:00 AM
 *   "0 3 * * 0"      - Every Sunday at 3:00 AM
 *   "0,15,30,45 * * * *" - Every 15 minutes
 */

import { CronExpressionParser } from "cron-parser";
import { InvalidScheduleError } from "../errors";

export interface ParseScheduleOptions {
  timezone?: string;
}

export interface Schedule {
  readonly expression: string;
  readonly timezone?: string;
  /**
   * First trigger instant strictly after `after`
   */
  next(after: Date): Date;
}

const MAX_NEXT_ATTEMPTS = 3;

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function parserOptions(currentDate: Date, timezone?: string) {
  return timezone ? { currentDate, tz: timezone } : { currentDate };
}

export function parseSchedule(expression: string, options?: ParseScheduleOptions): Schedule {
  const fields = expression.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 5) {
    throw new InvalidScheduleError(
      expression,
      `expected 5 fields (minute hour day-of-month month day-of-week), got ${fields.length}`,
    );
  }

  const timezone = options?.timezone;
  if (timezone && !isValidTimezone(timezone)) {
    throw new InvalidScheduleError(expression, `unknown timezone "${timezone}"`);
  }

  const normalized = fields.join(" ");
  try {
    CronExpressionParser.parse(normalized, parserOptions(new Date(), timezone));
  } catch (e) {
    throw new InvalidScheduleError(expression, e instanceof Error ? e.message : String(e));
  }

  return {
    expression: normalized,
    timezone,
    next(after: Date): Date {
      let candidate = after;
      for (let i = 0; i < MAX_NEXT_ATTEMPTS; i++) {
        const interval = CronExpressionParser.parse(
          normalized,
          parserOptions(candidate, timezone),
        );
        const found = interval.next().toDate();
        if (found.getTime() > after.getTime()) {
          return found;
        }
        candidate = new Date(Math.max(found.getTime(), candidate.getTime()) + 1000);
      }
      throw new InvalidScheduleError(expression, `no trigger after ${after.toISOString()}`);
    },
  };
}

/**
 * Whether a trigger instant has been reached; an unknown instant counts as due
 */
export function isDue(scheduledAt: Date | null, now: Date): boolean {
  return scheduledAt === null || now.getTime() >= scheduledAt.getTime();
}
