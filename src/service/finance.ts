import {
  addDays,
  buildForecast,
  ConfigurationError,
  expandAll,
  findLowestPoint,
  forecastBalances,
  parseCalendarDate,
  parseSeriesInput,
  todayUTC,
  type CalendarDate,
  type Cents,
  type Forecast,
  type ForecastDay,
  type LowestPoint,
  type Occurrence,
  type OneOffTransaction,
  type RecurringSeries,
} from "../engine/index.js";
import type { FinanceStore } from "../store/types.js";

export interface FinanceServiceOptions {
  /** Default forecast window length (days). */
  forecastDays?: number;
  /** Default look-ahead for upcoming transactions (days). */
  upcomingDays?: number;
  /** Clock used only to pick "today" for default windows. */
  now?: () => Date;
}

export interface ForecastRequest {
  startDate?: CalendarDate;
  days?: number;
  /** Overrides the stored starting balance. */
  startingBalance?: Cents;
}

/**
 * Fetches inputs from the store and hands them to the pure engine.
 *
 * Store failures propagate unchanged; nothing is retried and no
 * partial forecast is ever returned.
 */
export class FinanceService {
  private readonly forecastDays: number;
  private readonly upcomingDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: FinanceStore,
    options: FinanceServiceOptions = {},
  ) {
    this.forecastDays = options.forecastDays ?? 90;
    this.upcomingDays = options.upcomingDays ?? 30;
    this.now = options.now ?? (() => new Date());
  }

  today(): CalendarDate {
    return todayUTC(this.now());
  }

  // ── Forecasting ─────────────────────────────────────────────────────────

  async computeForecast(
    startingBalance: Cents,
    windowStart: CalendarDate,
    numDays: number,
  ): Promise<ForecastDay[]> {
    const start = parseCalendarDate(windowStart);
    const { oneOffs, series } = await this.fetchWindow(start, numDays);
    return forecastBalances({
      startingBalance,
      windowStart: start,
      numDays,
      oneOffs,
      series,
    });
  }

  /**
   * Forecast with defaults filled in: today, the configured window and
   * the stored starting balance.
   */
  async forecast(request: ForecastRequest = {}): Promise<Forecast> {
    const start = parseCalendarDate(request.startDate ?? this.today());
    const numDays = request.days ?? this.forecastDays;
    const [startingBalance, { oneOffs, series }] = await Promise.all([
      request.startingBalance ?? this.getStartingBalance(),
      this.fetchWindow(start, numDays),
    ]);
    return buildForecast({
      startingBalance,
      windowStart: start,
      numDays,
      oneOffs,
      series,
    });
  }

  findLowestPoint(days: readonly ForecastDay[]): LowestPoint {
    return findLowestPoint(days);
  }

  async lowestPointAhead(days?: number): Promise<LowestPoint> {
    const { days: forecastDays } = await this.forecast({ days });
    return findLowestPoint(forecastDays);
  }

  // ── Occurrences ─────────────────────────────────────────────────────────

  async expandRecurringBetween(
    windowStart: CalendarDate,
    windowEnd: CalendarDate,
  ): Promise<Occurrence[]> {
    const start = parseCalendarDate(windowStart);
    const end = parseCalendarDate(windowEnd);
    const series = await this.store.listActiveRecurringSeries();
    return expandAll(series, start, end);
  }

  /** One-offs in the range merged with projected recurring occurrences. */
  async transactionsBetween(
    windowStart: CalendarDate,
    windowEnd: CalendarDate,
  ): Promise<Occurrence[]> {
    const start = parseCalendarDate(windowStart);
    const end = parseCalendarDate(windowEnd);
    if (start > end) {
      throw new ConfigurationError(`start ${start} is after end ${end}`);
    }
    const [oneOffs, series] = await Promise.all([
      this.store.listOneOffTransactions({ start, end }),
      this.store.listActiveRecurringSeries(),
    ]);
    return expandAll(series, start, end, oneOffs);
  }

  /** Everything in [today, today + days]. */
  async upcomingTransactions(days = this.upcomingDays): Promise<Occurrence[]> {
    requireDays(days);
    const start = this.today();
    return this.transactionsBetween(start, addDays(start, days));
  }

  // ── One-off transactions ────────────────────────────────────────────────

  listTransactions(): Promise<OneOffTransaction[]> {
    return this.store.listAllTransactions();
  }

  async addIncome(
    date: CalendarDate,
    amount: Cents,
    description: string,
  ): Promise<OneOffTransaction> {
    requirePositive(amount);
    return this.store.createTransaction({
      date: parseCalendarDate(date),
      amount,
      description: description.trim(),
      direction: "income",
    });
  }

  /** `amount` is the magnitude; it is stored negative. */
  async addExpense(
    date: CalendarDate,
    amount: Cents,
    description: string,
  ): Promise<OneOffTransaction> {
    requirePositive(amount);
    return this.store.createTransaction({
      date: parseCalendarDate(date),
      amount: -amount,
      description: description.trim(),
      direction: "expense",
    });
  }

  deleteTransaction(id: number): Promise<boolean> {
    return this.store.deleteTransaction(id);
  }

  // ── Starting balance ────────────────────────────────────────────────────

  /** A balance that was never recorded counts as zero. */
  async getStartingBalance(): Promise<Cents> {
    return (await this.store.getStartingBalance()) ?? 0;
  }

  setStartingBalance(balance: Cents): Promise<void> {
    return this.store.setStartingBalance(balance);
  }

  // ── Recurring series ────────────────────────────────────────────────────

  async createRecurring(input: unknown): Promise<RecurringSeries> {
    return this.store.createRecurringSeries(parseSeriesInput(input));
  }

  /** Null when no series has that id; the input is only validated for a known series. */
  async updateRecurring(id: number, input: unknown): Promise<RecurringSeries | null> {
    if (!(await this.store.getRecurringSeries(id))) return null;
    return this.store.updateRecurringSeries(id, parseSeriesInput(input));
  }

  listRecurring(): Promise<RecurringSeries[]> {
    return this.store.listRecurringSeries();
  }

  deleteRecurring(id: number): Promise<boolean> {
    return this.store.deleteRecurringSeries(id);
  }

  setRecurringActive(id: number, active: boolean): Promise<boolean> {
    return this.store.setRecurringActive(id, active);
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private async fetchWindow(
    start: CalendarDate,
    numDays: number,
  ): Promise<{ oneOffs: OneOffTransaction[]; series: RecurringSeries[] }> {
    requireDays(numDays);
    if (numDays === 0) {
      return { oneOffs: [], series: [] };
    }
    const end = addDays(start, numDays - 1);
    const [oneOffs, series] = await Promise.all([
      this.store.listOneOffTransactions({ start, end }),
      this.store.listActiveRecurringSeries(),
    ]);
    return { oneOffs, series };
  }
}

function requireDays(days: number): void {
  if (!Number.isInteger(days) || days < 0) {
    throw new ConfigurationError(`days must be a non-negative integer, got ${days}`);
  }
}

function requirePositive(amount: Cents): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ConfigurationError("amount must be greater than zero");
  }
}
