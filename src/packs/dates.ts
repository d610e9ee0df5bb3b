/**
 * Date Engine: calendar-date parsing, YRMO labels and the retention window.
 *
 * Dates are calendar dates, never instants. The reference instant is read
 * through its UTC calendar fields so a run gives the same window on every host.
 */

import { DateFormatError } from "../shared/errors.js";
import type { CalendarDate } from "../shared/types.js";

// ── Parsing ──────────────────────────────────────────────────────────

type DatePattern = {
  regex: RegExp;
  pick: (m: RegExpExecArray) => [year: string, month: string, day: string];
};

const DATE_PATTERNS: DatePattern[] = [
  // ISO date, optionally followed by a time part
  { regex: /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ]\S.*)?$/, pick: (m) => [m[1], m[2], m[3]] },
  { regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, pick: (m) => [m[1], m[2], m[3]] },
  { regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, pick: (m) => [m[3], m[1], m[2]] },
  { regex: /^(\d{4})(\d{2})(\d{2})$/, pick: (m) => [m[1], m[2], m[3]] },
];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isValidCalendarDate(d: CalendarDate): boolean {
  return (
    d.year >= 1 &&
    d.month >= 1 &&
    d.month <= 12 &&
    d.day >= 1 &&
    d.day <= daysInMonth(d.year, d.month)
  );
}

/**
 * Parse a raw date value into a calendar date.
 * @throws DateFormatError when no accepted format matches or the date does not exist
 */
export function parseDate(rawValue: string | undefined): CalendarDate {
  const v = (rawValue ?? "").trim();
  for (const { regex, pick } of DATE_PATTERNS) {
    const m = regex.exec(v);
    if (!m) continue;
    const [y, mo, d] = pick(m);
    const date: CalendarDate = { year: Number(y), month: Number(mo), day: Number(d) };
    if (isValidCalendarDate(date)) return date;
    break;
  }
  throw new DateFormatError(v);
}

// ── Formatting ───────────────────────────────────────────────────────

const pad = (n: number, width: number): string => String(n).padStart(width, "0");

/** YYYY-MM-DD */
export function formatDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

/** YYYY-MM */
export function toYrmo(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}`;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Calendar fields of an instant, read in UTC. */
export function calendarDateOf(instant: Date): CalendarDate {
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
    day: instant.getUTCDate(),
  };
}

/** Midnight UTC on the given calendar date. */
export function instantOf(date: CalendarDate): Date {
  // Date.UTC maps years 0-99 onto 1900-1999
  const instant = new Date(Date.UTC(2000, date.month - 1, date.day));
  instant.setUTCFullYear(date.year);
  return instant;
}

// ── Retention Window ─────────────────────────────────────────────────

/**
 * First day of the month `monthsToRetain` months before the reference
 * instant's month. Working on month starts avoids end-of-month clamping.
 */
export function retentionCutoff(monthsToRetain: number, referenceInstant: Date): CalendarDate {
  const ref = calendarDateOf(referenceInstant);
  const monthIndex = ref.year * 12 + (ref.month - 1) - monthsToRetain;
  return { year: Math.floor(monthIndex / 12), month: (monthIndex % 12) + 1, day: 1 };
}

/**
 * True iff `date` is on or after the cutoff. There is no upper bound:
 * dates after the reference instant are retained.
 */
export function withinRetention(
  date: CalendarDate,
  monthsToRetain: number,
  referenceInstant: Date,
): boolean {
  return compareDates(date, retentionCutoff(monthsToRetain, referenceInstant)) >= 0;
}
