// ── Balance Forecasting ─────────────────────────────────────────────
// Projects a day-by-day balance by combining persisted one-offs with
// recurring series expanded over the forecast window.

import { addCents, type Cents } from "./money.js";
import { addDays, type CalendarDate } from "./dates.js";
import { expandSeries } from "./recurrence.js";
import { mergeOccurrences } from "./merge.js";
import { findLowestPoint } from "./lowest.js";
import type {
  ForecastDay,
  LowestPoint,
  Occurrence,
  OneOffTransaction,
  RecurringSeries,
} from "./types.js";

export interface ForecastInput {
  startingBalance: Cents;
  windowStart: CalendarDate;
  /** Window length; the last day is windowStart + numDays - 1. */
  numDays: number;
  oneOffs: readonly OneOffTransaction[];
  series: readonly RecurringSeries[];
}

export interface ForecastSummary {
  startingBalance: Cents;
  endingBalance: Cents;
  totalIncome: Cents;
  totalExpense: Cents;
  netChange: Cents;
  /** Null for an empty forecast. */
  lowestPoint: LowestPoint | null;
}

export interface Forecast {
  days: ForecastDay[];
  /** Merged occurrences inside the window. */
  occurrences: Occurrence[];
  summary: ForecastSummary;
}

/**
 * Expand every active series over a window and merge the result with
 * `oneOffs`, ordered as the balance forecast consumes them.
 */
export function expandAll(
  series: readonly RecurringSeries[],
  windowStart: CalendarDate,
  windowEnd: CalendarDate,
  oneOffs: readonly OneOffTransaction[] = [],
): Occurrence[] {
  const projected = series
    .filter((s) => s.active)
    .flatMap((s) => expandSeries(s, windowStart, windowEnd));
  return mergeOccurrences(oneOffs, projected);
}

/**
 * Day-by-day balance over [windowStart, windowStart + numDays - 1].
 *
 * Exactly `numDays` entries, one per calendar day, zero-change days
 * included. One-offs dated outside the window are ignored.
 */
export function forecastBalances(input: ForecastInput): ForecastDay[] {
  return buildForecast(input).days;
}

/**
 * Forecast plus the window's occurrences and a summary of them.
 */
export function buildForecast(input: ForecastInput): Forecast {
  const { startingBalance, windowStart, numDays } = input;
  if (!Number.isInteger(numDays) || numDays < 0) {
    throw new RangeError(`numDays must be a non-negative integer, got ${numDays}`);
  }
  if (numDays === 0) {
    return { days: [], occurrences: [], summary: summarize(startingBalance, [], []) };
  }

  const windowEnd = addDays(windowStart, numDays - 1);
  const oneOffs = input.oneOffs.filter(
    (tx) => tx.date >= windowStart && tx.date <= windowEnd,
  );
  const occurrences = expandAll(input.series, windowStart, windowEnd, oneOffs);

  // ── Bucket by calendar date ───────────────────────────────────────
  const daily = new Map<CalendarDate, Cents>();
  for (const occ of occurrences) {
    daily.set(occ.date, addCents(daily.get(occ.date) ?? 0, occ.amount));
  }

  // ── Accumulate ────────────────────────────────────────────────────
  const days: ForecastDay[] = [];
  let balance = startingBalance;
  for (let i = 0; i < numDays; i++) {
    const date = addDays(windowStart, i);
    const change = daily.get(date) ?? 0;
    balance = addCents(balance, change);
    days.push({ date, change, balance });
  }

  return {
    days,
    occurrences,
    summary: summarize(startingBalance, days, occurrences),
  };
}

function summarize(
  startingBalance: Cents,
  days: ForecastDay[],
  occurrences: Occurrence[],
): ForecastSummary {
  let totalIncome = 0;
  let totalExpense = 0;
  for (const occ of occurrences) {
    if (occ.amount >= 0) totalIncome = addCents(totalIncome, occ.amount);
    else totalExpense = addCents(totalExpense, -occ.amount);
  }

  const last = days[days.length - 1];
  const endingBalance = last?.balance ?? startingBalance;

  return {
    startingBalance,
    endingBalance,
    totalIncome,
    totalExpense,
    netChange: endingBalance - startingBalance,
    lowestPoint: days.length > 0 ? findLowestPoint(days) : null,
  };
}
