import type {
  CalendarDate,
  Cents,
  Direction,
  NewRecurringSeries,
  OneOffTransaction,
  RecurringSeries,
  Window,
} from "../engine/index.js";

export interface NewTransaction {
  date: CalendarDate;
  /** Signed: expenses are stored negative. */
  amount: Cents;
  description: string;
  direction: Direction;
}

/**
 * Persistence boundary for one-off transactions, recurring series and
 * the starting balance. Implementations reject with DataSourceError.
 */
export interface FinanceStore {
  /** One-offs dated inside the inclusive range, ascending by date. */
  listOneOffTransactions(range: Window): Promise<OneOffTransaction[]>;
  listAllTransactions(): Promise<OneOffTransaction[]>;
  createTransaction(tx: NewTransaction): Promise<OneOffTransaction>;
  /** False when no row had that id. */
  deleteTransaction(id: number): Promise<boolean>;

  listActiveRecurringSeries(): Promise<RecurringSeries[]>;
  listRecurringSeries(): Promise<RecurringSeries[]>;
  getRecurringSeries(id: number): Promise<RecurringSeries | null>;
  createRecurringSeries(series: NewRecurringSeries): Promise<RecurringSeries>;
  updateRecurringSeries(
    id: number,
    series: NewRecurringSeries,
  ): Promise<RecurringSeries | null>;
  deleteRecurringSeries(id: number): Promise<boolean>;
  setRecurringActive(id: number, active: boolean): Promise<boolean>;

  /** Null when no balance has been recorded yet. */
  getStartingBalance(): Promise<Cents | null>;
  setStartingBalance(balance: Cents): Promise<void>;
}
