import type { Cents } from "./money.js";
import type { CalendarDate } from "./dates.js";

export const INTERVALS = ["weekly", "biweekly", "monthly", "yearly"] as const;
export type RecurrenceInterval = (typeof INTERVALS)[number];

export const DIRECTIONS = ["income", "expense"] as const;
export type Direction = (typeof DIRECTIONS)[number];

export interface RecurringSeries {
  id: number;
  description: string;
  direction: Direction;
  /** Strictly positive; the sign comes from `direction`. */
  amount: Cents;
  /** Phase origin of the rule. */
  startDate: CalendarDate;
  interval: RecurrenceInterval;
  /** 0 = Sunday … 6 = Saturday (weekly/biweekly). */
  dayOfWeek: number | null;
  /** 1–31 (monthly/yearly), clamped to short months. */
  dayOfMonth: number | null;
  /** Inclusive. */
  endDate: CalendarDate | null;
  active: boolean;
}

/** Series fields as supplied at creation, before an id is assigned. */
export type NewRecurringSeries = Omit<RecurringSeries, "id">;

export interface OneOffTransaction {
  id: number;
  date: CalendarDate;
  /** Signed: income positive, expense negative. */
  amount: Cents;
  description: string;
  direction: Direction;
}

interface OccurrenceFields {
  date: CalendarDate;
  amount: Cents;
  description: string;
  direction: Direction;
}

export interface PersistedOccurrence extends OccurrenceFields {
  kind: "persisted";
  id: number;
}

export interface ProjectedOccurrence extends OccurrenceFields {
  kind: "projected";
  seriesId: number;
}

export type Occurrence = PersistedOccurrence | ProjectedOccurrence;

export interface ForecastDay {
  date: CalendarDate;
  /** Net of every occurrence landing on this date. */
  change: Cents;
  balance: Cents;
}

/** Closed interval, both ends inclusive. */
export interface Window {
  start: CalendarDate;
  end: CalendarDate;
}

export interface LowestPoint {
  day: ForecastDay;
  index: number;
}

export function isRecurrenceInterval(value: string): value is RecurrenceInterval {
  return INTERVALS.some((interval) => interval === value);
}

export function isDirection(value: string): value is Direction {
  return DIRECTIONS.some((direction) => direction === value);
}
