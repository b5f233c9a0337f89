// ── Transport Records ───────────────────────────────────────────────
// Flat records for JSON responses. Amounts become display numbers here
// and nowhere earlier.

import {
  centsToNumber,
  type ForecastDay,
  type ForecastSummary,
  type LowestPoint,
  type Occurrence,
  type OneOffTransaction,
  type RecurringSeries,
} from "../engine/index.js";

export interface ForecastDayRecord {
  date: string;
  change: number;
  balance: number;
}

export interface OccurrenceRecord {
  date: string;
  amount: number;
  description: string;
  type: string;
  source: "transaction" | "recurring";
  id: number;
}

export function forecastDayRecord(day: ForecastDay): ForecastDayRecord {
  return {
    date: day.date,
    change: centsToNumber(day.change),
    balance: centsToNumber(day.balance),
  };
}

export function lowestPointRecord(lowest: LowestPoint) {
  return {
    lowestPoint: forecastDayRecord(lowest.day),
    dayIndex: lowest.index,
  };
}

export function occurrenceRecord(occ: Occurrence): OccurrenceRecord {
  return {
    date: occ.date,
    amount: centsToNumber(occ.amount),
    description: occ.description,
    type: occ.direction,
    source: occ.kind === "persisted" ? "transaction" : "recurring",
    id: occ.kind === "persisted" ? occ.id : occ.seriesId,
  };
}

export function transactionRecord(tx: OneOffTransaction) {
  return {
    id: tx.id,
    date: tx.date,
    amount: centsToNumber(tx.amount),
    description: tx.description,
    type: tx.direction,
  };
}

export function seriesRecord(series: RecurringSeries) {
  return {
    id: series.id,
    description: series.description,
    type: series.direction,
    amount: centsToNumber(series.amount),
    startDate: series.startDate,
    interval: series.interval,
    dayOfWeek: series.dayOfWeek,
    dayOfMonth: series.dayOfMonth,
    endDate: series.endDate,
    active: series.active,
  };
}

export function summaryRecord(summary: ForecastSummary) {
  return {
    startingBalance: centsToNumber(summary.startingBalance),
    endingBalance: centsToNumber(summary.endingBalance),
    totalIncome: centsToNumber(summary.totalIncome),
    totalExpense: centsToNumber(summary.totalExpense),
    netChange: centsToNumber(summary.netChange),
    lowestPoint: summary.lowestPoint ? lowestPointRecord(summary.lowestPoint) : null,
  };
}
