import { existsSync, readFileSync, writeFileSync } from "node:fs";
import sqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js";
import {
  DataSourceError,
  formatCents,
  isDirection,
  isRecurrenceInterval,
  parseAmount,
  type Cents,
  type NewRecurringSeries,
  type OneOffTransaction,
  type RecurringSeries,
  type Window,
} from "../engine/index.js";
import type { FinanceStore, NewTransaction } from "./types.js";

type Row = Record<string, SqlValue>;

// ── Constants ───────────────────────────────────────────────────────────────

const MEMORY = ":memory:";
const STARTING_BALANCE_KEY = "starting_balance";

const TRANSACTION_COLUMNS = "id, date, amount, description, type";

const SERIES_COLUMNS = `id, description, type, amount, start_date, interval,
  day_of_week, day_of_month, end_date, active`;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount INTEGER NOT NULL,
    description TEXT NOT NULL,
    type TEXT NOT NULL CHECK (type IN ('income', 'expense')),
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date);

  CREATE TABLE IF NOT EXISTS recurring_series (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    description TEXT NOT NULL,
    type TEXT NOT NULL CHECK (type IN ('income', 'expense')),
    amount INTEGER NOT NULL CHECK (amount > 0),
    start_date TEXT NOT NULL,
    interval TEXT NOT NULL CHECK (interval IN ('weekly', 'biweekly', 'monthly', 'yearly')),
    day_of_week INTEGER CHECK (day_of_week BETWEEN 0 AND 6),
    day_of_month INTEGER CHECK (day_of_month BETWEEN 1 AND 31),
    end_date TEXT,
    active INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

let engine: Promise<SqlJsStatic> | undefined;

// The WASM module is compiled once per process
function loadEngine(): Promise<SqlJsStatic> {
  // `.default` resolves the CommonJS export under both module systems
  engine ??= sqlJs.default();
  return engine;
}

/**
 * SQLite-backed store on sql.js. Amounts are INTEGER cents; dates are
 * "YYYY-MM-DD" TEXT so lexical order is date order.
 *
 * The database lives in memory and is written back to `dbPath` after
 * every change (unless the path is ":memory:").
 */
export class SqliteFinanceStore implements FinanceStore {
  private constructor(
    private readonly db: Database,
    private readonly dbPath: string,
  ) {}

  static async open(dbPath = "cashflow-forecast.db"): Promise<SqliteFinanceStore> {
    try {
      const SQL = await loadEngine();
      const db =
        dbPath !== MEMORY && existsSync(dbPath)
          ? new SQL.Database(readFileSync(dbPath))
          : new SQL.Database();
      db.exec(SCHEMA);
      const store = new SqliteFinanceStore(db, dbPath);
      store.persist();
      return store;
    } catch (error) {
      throw new DataSourceError(`Failed to open database ${dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  close(): void {
    this.db.close();
  }

  // ── Transactions ──────────────────────────────────────────────────────────

  async listOneOffTransactions(range: Window): Promise<OneOffTransaction[]> {
    return this.read("list transactions", () =>
      this.all(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions
         WHERE date BETWEEN ? AND ?
         ORDER BY date ASC, id ASC`,
        [range.start, range.end],
      ).map(toTransaction),
    );
  }

  async listAllTransactions(): Promise<OneOffTransaction[]> {
    return this.read("list transactions", () =>
      this.all(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions
         ORDER BY date ASC, id ASC`,
      ).map(toTransaction),
    );
  }

  async createTransaction(tx: NewTransaction): Promise<OneOffTransaction> {
    return this.write("create transaction", () => {
      const [row] = this.all(
        `INSERT INTO transactions (date, amount, description, type)
         VALUES (?, ?, ?, ?)
         RETURNING ${TRANSACTION_COLUMNS}`,
        [tx.date, tx.amount, tx.description, tx.direction],
      );
      if (!row) throw new Error("insert returned no row");
      return toTransaction(row);
    });
  }

  async deleteTransaction(id: number): Promise<boolean> {
    return this.write("delete transaction", () =>
      this.run("DELETE FROM transactions WHERE id = ?", [id]) > 0,
    );
  }

  // ── Recurring series ──────────────────────────────────────────────────────

  async listActiveRecurringSeries(): Promise<RecurringSeries[]> {
    return this.read("list recurring series", () =>
      this.all(
        `SELECT ${SERIES_COLUMNS} FROM recurring_series WHERE active = 1 ORDER BY id`,
      ).map(toSeries),
    );
  }

  async listRecurringSeries(): Promise<RecurringSeries[]> {
    return this.read("list recurring series", () =>
      this.all(`SELECT ${SERIES_COLUMNS} FROM recurring_series ORDER BY id`).map(toSeries),
    );
  }

  async getRecurringSeries(id: number): Promise<RecurringSeries | null> {
    return this.read("get recurring series", () => {
      const [row] = this.all(
        `SELECT ${SERIES_COLUMNS} FROM recurring_series WHERE id = ?`,
        [id],
      );
      return row ? toSeries(row) : null;
    });
  }

  async createRecurringSeries(series: NewRecurringSeries): Promise<RecurringSeries> {
    return this.write("create recurring series", () => {
      const [row] = this.all(
        `INSERT INTO recurring_series
           (description, type, amount, start_date, interval,
            day_of_week, day_of_month, end_date, active)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         RETURNING ${SERIES_COLUMNS}`,
        seriesParams(series),
      );
      if (!row) throw new Error("insert returned no row");
      return toSeries(row);
    });
  }

  async updateRecurringSeries(
    id: number,
    series: NewRecurringSeries,
  ): Promise<RecurringSeries | null> {
    return this.write("update recurring series", () => {
      const [row] = this.all(
        `UPDATE recurring_series SET
           description  = ?,
           type         = ?,
           amount       = ?,
           start_date   = ?,
           interval     = ?,
           day_of_week  = ?,
           day_of_month = ?,
           end_date     = ?,
           active       = ?
         WHERE id = ?
         RETURNING ${SERIES_COLUMNS}`,
        [...seriesParams(series), id],
      );
      return row ? toSeries(row) : null;
    });
  }

  async deleteRecurringSeries(id: number): Promise<boolean> {
    return this.write("delete recurring series", () =>
      this.run("DELETE FROM recurring_series WHERE id = ?", [id]) > 0,
    );
  }

  async setRecurringActive(id: number, active: boolean): Promise<boolean> {
    return this.write("update recurring series", () =>
      this.run("UPDATE recurring_series SET active = ? WHERE id = ?", [active ? 1 : 0, id]) > 0,
    );
  }

  // ── Settings ──────────────────────────────────────────────────────────────

  async getStartingBalance(): Promise<Cents | null> {
    return this.read("read starting balance", () => {
      const [row] = this.all("SELECT value FROM settings WHERE key = ?", [
        STARTING_BALANCE_KEY,
      ]);
      return row ? parseAmount(textColumn(row, "value")) : null;
    });
  }

  async setStartingBalance(balance: Cents): Promise<void> {
    this.write("write starting balance", () => {
      this.run(
        `INSERT INTO settings (key, value, updated_at)
         VALUES (?, ?, datetime('now'))
         ON CONFLICT (key)
         DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
        [STARTING_BALANCE_KEY, formatCents(balance)],
      );
    });
  }

  // ── Driver helpers ────────────────────────────────────────────────────────

  private all(sql: string, params: SqlValue[] = []): Row[] {
    const stmt = this.db.prepare(sql, params);
    try {
      const rows: Row[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  /** Number of rows changed. */
  private run(sql: string, params: SqlValue[]): number {
    this.db.run(sql, params);
    return this.db.getRowsModified();
  }

  private persist(): void {
    if (this.dbPath === MEMORY) return;
    writeFileSync(this.dbPath, this.db.export());
  }

  private read<T>(operation: string, fn: () => T): T {
    return guard(operation, fn);
  }

  private write<T>(operation: string, fn: () => T): T {
    return guard(operation, () => {
      const result = fn();
      this.persist();
      return result;
    });
  }
}

/** Run a driver call, rethrowing any failure as DataSourceError. */
function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof DataSourceError) throw error;
    throw new DataSourceError(`Failed to ${operation}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ── Mapping ─────────────────────────────────────────────────────────────────

function seriesParams(series: NewRecurringSeries): SqlValue[] {
  return [
    series.description,
    series.direction,
    series.amount,
    series.startDate,
    series.interval,
    series.dayOfWeek,
    series.dayOfMonth,
    series.endDate,
    series.active ? 1 : 0,
  ];
}

function intColumn(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new DataSourceError(`Column ${column} is not an integer`);
  }
  return value;
}

function nullableIntColumn(row: Row, column: string): number | null {
  return row[column] === null ? null : intColumn(row, column);
}

function textColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new DataSourceError(`Column ${column} is not text`);
  }
  return value;
}

function nullableTextColumn(row: Row, column: string): string | null {
  return row[column] === null ? null : textColumn(row, column);
}

function toTransaction(row: Row): OneOffTransaction {
  const id = intColumn(row, "id");
  const type = textColumn(row, "type");
  if (!isDirection(type)) {
    throw new DataSourceError(`Transaction ${id} has unknown type "${type}"`);
  }
  return {
    id,
    date: textColumn(row, "date"),
    amount: intColumn(row, "amount"),
    description: textColumn(row, "description"),
    direction: type,
  };
}

function toSeries(row: Row): RecurringSeries {
  const id = intColumn(row, "id");
  const type = textColumn(row, "type");
  const interval = textColumn(row, "interval");
  if (!isDirection(type)) {
    throw new DataSourceError(`Recurring series ${id} has unknown type "${type}"`);
  }
  if (!isRecurrenceInterval(interval)) {
    throw new DataSourceError(`Recurring series ${id} has unknown interval "${interval}"`);
  }
  return {
    id,
    description: textColumn(row, "description"),
    direction: type,
    amount: intColumn(row, "amount"),
    startDate: textColumn(row, "start_date"),
    interval,
    dayOfWeek: nullableIntColumn(row, "day_of_week"),
    dayOfMonth: nullableIntColumn(row, "day_of_month"),
    endDate: nullableTextColumn(row, "end_date"),
    active: intColumn(row, "active") === 1,
  };
}
