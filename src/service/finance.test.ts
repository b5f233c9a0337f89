import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { FinanceService } from "./finance.js";
import { SqliteFinanceStore } from "../store/sqlite.js";
import {
  ConfigurationError,
  DataSourceError,
  EmptyInputError,
} from "../engine/index.js";

let store: SqliteFinanceStore;
let service: FinanceService;

beforeEach(async () => {
  store = await SqliteFinanceStore.open(":memory:");
  service = new FinanceService(store, {
    forecastDays: 30,
    upcomingDays: 7,
    // Saturday
    now: () => new Date("2025-03-01T12:00:00Z"),
  });
});

afterEach(() => {
  store.close();
});

const paycheck = {
  description: "Paycheck",
  direction: "income",
  amount: "2000",
  startDate: "2025-03-07",
  interval: "biweekly",
};

describe("computeForecast", () => {
  test("applies stored one-offs to the given balance", async () => {
    await service.addExpense("2025-03-02", 150_000, "Car repair");

    const days = await service.computeForecast(100_000, "2025-03-01", 3);

    expect(days).toEqual([
      { date: "2025-03-01", change: 0, balance: 100_000 },
      { date: "2025-03-02", change: -150_000, balance: -50_000 },
      { date: "2025-03-03", change: 0, balance: -50_000 },
    ]);
  });

  test("includes active recurring series", async () => {
    await service.createRecurring(paycheck);

    const days = await service.computeForecast(0, "2025-03-01", 21);

    expect(days[6]).toEqual({ date: "2025-03-07", change: 200_000, balance: 200_000 });
    expect(days[20]).toEqual({ date: "2025-03-21", change: 200_000, balance: 400_000 });
  });

  test("store failures propagate unchanged", async () => {
    const failure = new DataSourceError("connection lost");
    vi.spyOn(store, "listActiveRecurringSeries").mockRejectedValue(failure);

    await expect(service.computeForecast(0, "2025-03-01", 3)).rejects.toBe(failure);
  });
});

describe("forecast", () => {
  test("missing starting balance counts as zero", async () => {
    const { days, summary } = await service.forecast();

    expect(days).toHaveLength(30);
    expect(days[0]?.date).toBe("2025-03-01");
    expect(summary.startingBalance).toBe(0);
    expect(summary.endingBalance).toBe(0);
  });

  test("uses the stored balance and the requested window", async () => {
    await service.setStartingBalance(50_000);
    await service.addIncome("2025-03-10", 1_250, "Cashback");

    const { days, summary } = await service.forecast({
      startDate: "2025-03-09",
      days: 3,
    });

    expect(days.map((d) => d.balance)).toEqual([50_000, 51_250, 51_250]);
    expect(summary.totalIncome).toBe(1_250);
  });

  test("an explicit starting balance wins over the stored one", async () => {
    await service.setStartingBalance(50_000);
    const { summary } = await service.forecast({ days: 1, startingBalance: -10 });
    expect(summary.startingBalance).toBe(-10);
  });
});

describe("lowest point", () => {
  test("finds the dip ahead", async () => {
    await service.setStartingBalance(10_000);
    await service.addExpense("2025-03-04", 30_000, "Insurance");
    await service.addIncome("2025-03-06", 40_000, "Bonus");

    const lowest = await service.lowestPointAhead(10);

    expect(lowest).toEqual({
      day: { date: "2025-03-04", change: -30_000, balance: -20_000 },
      index: 3,
    });
  });

  test("an empty forecast is an error", () => {
    expect(() => service.findLowestPoint([])).toThrow(EmptyInputError);
  });
});

describe("occurrences", () => {
  test("expandRecurringBetween skips inactive series", async () => {
    const rent = await service.createRecurring({
      description: "Rent",
      direction: "expense",
      amount: 1450,
      startDate: "2025-01-01",
      interval: "monthly",
    });
    await service.createRecurring(paycheck);
    await service.setRecurringActive(rent.id, false);

    const occurrences = await service.expandRecurringBetween("2025-03-01", "2025-03-31");

    expect(occurrences.map((o) => `${o.date} ${o.description}`)).toEqual([
      "2025-03-07 Paycheck",
      "2025-03-21 Paycheck",
    ]);
  });

  test("transactionsBetween merges one-offs with projections", async () => {
    await service.createRecurring(paycheck);
    await service.addExpense("2025-03-07", 4_000, "Lunch");
    await service.addExpense("2025-03-07", 9_900, "Phone");

    const occurrences = await service.transactionsBetween("2025-03-07", "2025-03-07");

    expect(occurrences.map((o) => [o.kind, o.description, o.amount])).toEqual([
      ["persisted", "Lunch", -4_000],
      ["projected", "Paycheck", 200_000],
      ["persisted", "Phone", -9_900],
    ]);
  });

  test("transactionsBetween rejects an inverted range", async () => {
    await expect(
      service.transactionsBetween("2025-03-10", "2025-03-01"),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  test("upcoming window runs from today through today + days", async () => {
    await service.addExpense("2025-03-08", 100, "Inside");
    await service.addExpense("2025-03-09", 100, "Outside");
    await service.addExpense("2025-02-28", 100, "Past");

    const upcoming = await service.upcomingTransactions();

    expect(upcoming.map((o) => o.description)).toEqual(["Inside"]);
  });
});

describe("writes", () => {
  test("expenses are stored negative", async () => {
    const tx = await service.addExpense("2025-03-02", 2_500, "  Books ");
    expect(tx.amount).toBe(-2_500);
    expect(tx.description).toBe("Books");
  });

  test("non-positive amounts are rejected", async () => {
    await expect(service.addIncome("2025-03-02", 0, "Nothing")).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  test("invalid series never reach the store", async () => {
    await expect(
      service.createRecurring({ ...paycheck, interval: "fortnightly" }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(await service.listRecurring()).toEqual([]);
  });

  test("updateRecurring validates and replaces the series", async () => {
    const created = await service.createRecurring(paycheck);
    const updated = await service.updateRecurring(created.id, {
      ...paycheck,
      amount: "2100.50",
    });
    expect(updated?.amount).toBe(210_050);
  });

  test("updateRecurring returns null for an unknown id before validating", async () => {
    expect(await service.updateRecurring(404, { interval: "fortnightly" })).toBeNull();
  });

  test("updateRecurring still rejects invalid input for a known id", async () => {
    const created = await service.createRecurring(paycheck);
    await expect(
      service.updateRecurring(created.id, { ...paycheck, amount: "0" }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
