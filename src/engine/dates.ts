// ── Calendar Dates ──────────────────────────────────────────────────
// Timezone-less "YYYY-MM-DD" dates. All arithmetic runs on UTC
// epoch-day numbers, so local time and DST never apply.

export type CalendarDate = string;

const MS_PER_DAY = 86_400_000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match.map(Number);
  if (y === undefined || m === undefined || d === undefined) return false;
  return m >= 1 && m <= 12 && d >= 1 && d <= daysInMonth(y, m);
}

/**
 * Parse "YYYY-MM-DD" or an ISO timestamp (date part is taken as-is).
 */
export function parseCalendarDate(value: string): CalendarDate {
  const trimmed = value.trim();
  const candidate =
    trimmed.length > 10 && trimmed[10] === "T" ? trimmed.slice(0, 10) : trimmed;
  if (!isCalendarDate(candidate)) {
    throw new RangeError(`Unable to parse date: ${value}`);
  }
  return candidate;
}

export function toEpochDay(date: CalendarDate): number {
  const [y = 0, m = 1, d = 1] = date.split("-").map(Number);
  // setUTCFullYear, unlike Date.UTC, does not map years 0-99 to 1900-1999
  return Math.floor(new Date(0).setUTCFullYear(y, m - 1, d) / MS_PER_DAY);
}

/** @throws RangeError outside years 0000-9999 */
export function fromEpochDay(day: number): CalendarDate {
  const date = new Date(day * MS_PER_DAY);
  const year = date.getUTCFullYear();
  if (!(year >= 0 && year <= 9999)) {
    throw new RangeError("Date out of range (years 0000-9999)");
  }
  return formatYMD(year, date.getUTCMonth() + 1, date.getUTCDate());
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** Whole days from `a` to `b` (positive when `b` is later). */
export function diffDays(a: CalendarDate, b: CalendarDate): number {
  return toEpochDay(b) - toEpochDay(a);
}

/** 0 = Sunday … 6 = Saturday. */
export function weekday(date: CalendarDate): number {
  // 1970-01-01 was a Thursday
  return (((toEpochDay(date) + 4) % 7) + 7) % 7;
}

export function yearOf(date: CalendarDate): number {
  return Number(date.slice(0, 4));
}

/** 1-based month. */
export function monthOf(date: CalendarDate): number {
  return Number(date.slice(5, 7));
}

export function dayOf(date: CalendarDate): number {
  return Number(date.slice(8, 10));
}

export function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

/**
 * The given day of a month, clamped to the month's last day
 * (day 31 in February → Feb 28/29).
 */
export function dateAtDayOrMonthEnd(
  year: number,
  month: number,
  day: number,
): CalendarDate {
  const clamped = Math.min(day, daysInMonth(year, month));
  return formatYMD(year, month, clamped);
}

export function formatYMD(year: number, month: number, day: number): CalendarDate {
  const y = String(year).padStart(4, "0");
  const m = String(month).padStart(2, "0");
  const d = String(day).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function maxDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a > b ? a : b;
}

export function minDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a < b ? a : b;
}

/** Current UTC calendar date for the given instant. */
export function todayUTC(now: Date): CalendarDate {
  return now.toISOString().slice(0, 10);
}
