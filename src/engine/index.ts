// ── Forecast Engine ──────────────────────────────────────────────────
// Barrel export for the engine modules.
// Pure functions only; no store, MCP or HTTP dependencies.

export {
  ConfigurationError,
  DataSourceError,
  EmptyInputError,
} from "./errors.js";

export {
  centsToNumber,
  formatCents,
  parseAmount,
  type Cents,
} from "./money.js";

export {
  addDays,
  parseCalendarDate,
  todayUTC,
  type CalendarDate,
} from "./dates.js";

export {
  isDirection,
  isRecurrenceInterval,
  type Direction,
  type ForecastDay,
  type LowestPoint,
  type NewRecurringSeries,
  type Occurrence,
  type OneOffTransaction,
  type PersistedOccurrence,
  type ProjectedOccurrence,
  type RecurrenceInterval,
  type RecurringSeries,
  type Window,
} from "./types.js";

export { parseSeriesInput } from "./series.js";
export { expandSeries } from "./recurrence.js";
export { mergeOccurrences } from "./merge.js";
export {
  buildForecast,
  expandAll,
  forecastBalances,
  type Forecast,
  type ForecastInput,
  type ForecastSummary,
} from "./forecast.js";
export { findLowestPoint } from "./lowest.js";
