// ── Recurrence Expansion ────────────────────────────────────────────
// Turns one recurring series into concrete dated occurrences over a
// closed window. Pure: the result depends only on (series, window).

import {
  dateAtDayOrMonthEnd,
  dayOf,
  diffDays,
  fromEpochDay,
  maxDate,
  minDate,
  monthOf,
  toEpochDay,
  weekday,
  yearOf,
  type CalendarDate,
} from "./dates.js";
import type { ProjectedOccurrence, RecurringSeries } from "./types.js";

/**
 * Expand a series over [windowStart, windowEnd], ascending by date.
 *
 * Only dates inside both the window and the series' own validity
 * interval [startDate, endDate] are emitted.
 */
export function expandSeries(
  series: RecurringSeries,
  windowStart: CalendarDate,
  windowEnd: CalendarDate,
): ProjectedOccurrence[] {
  if (series.startDate > windowEnd) return [];
  if (series.endDate !== null && series.endDate < windowStart) return [];

  const from = maxDate(windowStart, series.startDate);
  const to = series.endDate !== null ? minDate(windowEnd, series.endDate) : windowEnd;
  if (from > to) return [];

  return occurrenceDates(series, from, to).map((date) =>
    toOccurrence(series, date),
  );
}

function occurrenceDates(
  series: RecurringSeries,
  from: CalendarDate,
  to: CalendarDate,
): CalendarDate[] {
  switch (series.interval) {
    case "weekly":
      return weeklyDates(series, from, to, 7);
    case "biweekly":
      return weeklyDates(series, from, to, 14);
    case "monthly":
      return monthlyDates(series, from, to);
    case "yearly":
      return yearlyDates(series, from, to);
  }
}

// ── Weekly / biweekly ───────────────────────────────────────────────

/**
 * Candidates step from the anchor in `step`-day increments; each is then
 * moved forward to the target weekday. With no weekday override the
 * shift is zero and this is plain "every N days from the anchor".
 */
function weeklyDates(
  series: RecurringSeries,
  from: CalendarDate,
  to: CalendarDate,
  step: number,
): CalendarDate[] {
  const anchor = series.startDate;
  const target = series.dayOfWeek ?? weekday(anchor);
  const shift = (target - weekday(anchor) + 7) % 7;

  // First cycle whose snapped date lands on or after `from`
  const lead = diffDays(anchor, from) - shift;
  const firstCycle = lead > 0 ? Math.ceil(lead / step) : 0;

  // Stepped as epoch days so nothing past `to` is ever formatted
  const last = toEpochDay(to);
  const out: CalendarDate[] = [];
  for (
    let day = toEpochDay(anchor) + firstCycle * step + shift;
    day <= last;
    day += step
  ) {
    out.push(fromEpochDay(day));
  }
  return out;
}

// ── Monthly ─────────────────────────────────────────────────────────

function monthlyDates(
  series: RecurringSeries,
  from: CalendarDate,
  to: CalendarDate,
): CalendarDate[] {
  const anchor = series.startDate;
  const day = series.dayOfMonth ?? dayOf(anchor);

  const out: CalendarDate[] = [];
  const lastYear = yearOf(to);
  const lastMonth = monthOf(to);
  let year = yearOf(from);
  let month = monthOf(from);

  while (year < lastYear || (year === lastYear && month <= lastMonth)) {
    const d = dateAtDayOrMonthEnd(year, month, day);
    if (d >= from && d <= to && d >= anchor) out.push(d);
    if (month === 12) {
      year++;
      month = 1;
    } else {
      month++;
    }
  }
  return out;
}

// ── Yearly ──────────────────────────────────────────────────────────

function yearlyDates(
  series: RecurringSeries,
  from: CalendarDate,
  to: CalendarDate,
): CalendarDate[] {
  const anchor = series.startDate;
  const month = monthOf(anchor);
  const day = series.dayOfMonth ?? dayOf(anchor);

  const out: CalendarDate[] = [];
  for (let year = yearOf(from); year <= yearOf(to); year++) {
    const d = dateAtDayOrMonthEnd(year, month, day);
    if (d >= from && d <= to && d >= anchor) out.push(d);
  }
  return out;
}

function toOccurrence(
  series: RecurringSeries,
  date: CalendarDate,
): ProjectedOccurrence {
  return {
    kind: "projected",
    seriesId: series.id,
    date,
    amount: series.direction === "expense" ? -series.amount : series.amount,
    description: series.description,
    direction: series.direction,
  };
}
