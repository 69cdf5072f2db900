/**
 * Pure date arithmetic on ISO 8601 calendar dates (YYYY-MM-DD).
 *
 * All dates are handled at UTC midnight so that adding days never crosses a DST
 * boundary. Weekdays use ISO numbering: Monday = 1 ... Sunday = 7.
 */

import type { DateRange, Weekday } from '@crewplan/shared';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

// Indexed by Date#getUTCDay(), which starts the week on Sunday.
const ISO_WEEKDAY_BY_UTC_DAY: readonly Weekday[] = [7, 1, 2, 3, 4, 5, 6];

/**
 * Parse an ISO 8601 date string (YYYY-MM-DD) and return a UTC Date object.
 */
export function parseDate(dateStr: string): Date {
  return new Date(dateStr + 'T00:00:00Z');
}

/**
 * Format a UTC Date object as an ISO 8601 date string (YYYY-MM-DD).
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * true when the string is a real calendar date in YYYY-MM-DD form
 * (rejects e.g. 2025-02-30, which Date would silently roll over).
 */
export function isValidDate(dateStr: string): boolean {
  if (!ISO_DATE_RE.test(dateStr)) return false;
  const parsed = parseDate(dateStr);
  return !isNaN(parsed.getTime()) && formatDate(parsed) === dateStr;
}

/**
 * Add a number of days to an ISO date string. Negative values subtract.
 */
export function addDays(dateStr: string, days: number): string {
  const d = parseDate(dateStr);
  d.setUTCDate(d.getUTCDate() + days);
  return formatDate(d);
}

export function maxDate(a: string, b: string): string {
  return a >= b ? a : b;
}

export function minDate(a: string, b: string): string {
  return a <= b ? a : b;
}

/**
 * Difference in calendar days between two ISO date strings (b - a).
 */
export function diffDays(a: string, b: string): number {
  return Math.round((parseDate(b).getTime() - parseDate(a).getTime()) / MS_PER_DAY);
}

/**
 * Number of calendar days covered by an inclusive range.
 */
export function spanDays(range: DateRange): number {
  return diffDays(range.start, range.end) + 1;
}

/**
 * ISO weekday of a date: Monday = 1 ... Sunday = 7.
 */
export function isoWeekday(dateStr: string): Weekday {
  return ISO_WEEKDAY_BY_UTC_DAY[parseDate(dateStr).getUTCDay()];
}

export function isWorkingDay(dateStr: string, daysOff: ReadonlySet<Weekday>): boolean {
  return !daysOff.has(isoWeekday(dateStr));
}

/**
 * Count working days in an inclusive date range.
 */
export function countWorkingDays(
  start: string,
  end: string,
  daysOff: ReadonlySet<Weekday>,
): number {
  let count = 0;
  for (let day = start; day <= end; day = addDays(day, 1)) {
    if (isWorkingDay(day, daysOff)) count++;
  }
  return count;
}

/**
 * First working day on or after `dateStr`.
 * Returns null when none is found within `maxSteps` calendar days.
 */
export function nextWorkingDay(
  dateStr: string,
  daysOff: ReadonlySet<Weekday>,
  maxSteps: number,
): string | null {
  let day = dateStr;
  for (let step = 0; step <= maxSteps; step++) {
    if (isWorkingDay(day, daysOff)) return day;
    day = addDays(day, 1);
  }
  return null;
}

/**
 * Let `count` working days elapse from `start` (inclusive), then return the first
 * working day after them. With count = 0 this is the first working day on or after
 * `start`. Returns null when more than `maxSteps` calendar days would be walked.
 */
export function skipWorkingDays(
  start: string,
  count: number,
  daysOff: ReadonlySet<Weekday>,
  maxSteps: number,
): string | null {
  let day = start;
  let elapsed = 0;
  let steps = 0;
  while (elapsed < count) {
    if (steps >= maxSteps) return null;
    if (isWorkingDay(day, daysOff)) elapsed++;
    day = addDays(day, 1);
    steps++;
  }
  return nextWorkingDay(day, daysOff, Math.max(0, maxSteps - steps));
}

/**
 * Date on which the `count`-th working day is reached, counting `start` itself as
 * day 1 when it is a working day. Returns null past `maxSteps` calendar days.
 */
export function addWorkingDays(
  start: string,
  count: number,
  daysOff: ReadonlySet<Weekday>,
  maxSteps: number,
): string | null {
  let day = start;
  let counted = 0;
  for (let step = 0; step <= maxSteps; step++) {
    if (isWorkingDay(day, daysOff)) {
      counted++;
      if (counted >= count) return day;
    }
    day = addDays(day, 1);
  }
  return null;
}

/**
 * true when `isAvailable` holds for every calendar day of the inclusive range.
 */
export function isAvailableOver(range: DateRange, isAvailable: (date: string) => boolean): boolean {
  for (let day = range.start; day <= range.end; day = addDays(day, 1)) {
    if (!isAvailable(day)) return false;
  }
  return true;
}

/**
 * Try `probe` on `start` and each following calendar day, `horizonDays` candidates in
 * total, and return its first non-null result. null when the horizon is exhausted.
 */
export function searchForward<T>(
  start: string,
  horizonDays: number,
  probe: (candidate: string) => T | null,
): T | null {
  let candidate = start;
  for (let attempt = 0; attempt < horizonDays; attempt++) {
    const found = probe(candidate);
    if (found !== null) return found;
    candidate = addDays(candidate, 1);
  }
  return null;
}
