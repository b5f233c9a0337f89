import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createMcpServer } from "./server.js";
import { FinanceService } from "../service/finance.js";
import { SqliteFinanceStore } from "../store/sqlite.js";

let store: SqliteFinanceStore;
let client: Client;

beforeEach(async () => {
  store = await SqliteFinanceStore.open(":memory:");
  const service = new FinanceService(store, {
    forecastDays: 30,
    upcomingDays: 7,
    // Saturday
    now: () => new Date("2025-03-01T12:00:00Z"),
  });
  const server = createMcpServer(service);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "1.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
  store.close();
});

async function call(name: string, args: Record<string, unknown> = {}) {
  const result = await client.callTool({ name, arguments: args });
  const content = Array.isArray(result.content) ? result.content : [];
  const first: unknown = content[0];
  if (
    typeof first !== "object" ||
    first === null ||
    !("text" in first) ||
    typeof first.text !== "string"
  ) {
    throw new Error(`${name} returned no text content`);
  }
  return { text: first.text, isError: result.isError === true };
}

async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const { text, isError } = await call(name, args);
  if (isError) throw new Error(text);
  return JSON.parse(text);
}

const paycheck = {
  description: "Paycheck",
  type: "income",
  amount: "2000",
  start_date: "2025-03-07",
  interval: "biweekly",
};

describe("registration", () => {
  test("exposes the forecast and ledger tools", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      "add_expense",
      "add_income",
      "create_recurring",
      "delete_recurring",
      "delete_transaction",
      "get_forecast",
      "get_lowest_point",
      "get_starting_balance",
      "get_transactions_between",
      "get_upcoming_transactions",
      "list_recurring",
      "list_transactions",
      "set_recurring_active",
      "set_starting_balance",
      "update_recurring",
    ]);
  });

  test("exposes the checkup prompt", async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((p) => p.name)).toEqual(["cashflow-checkup"]);

    const prompt = await client.getPrompt({ name: "cashflow-checkup" });
    expect(prompt.messages).toHaveLength(1);
    expect(prompt.messages[0]?.role).toBe("user");
  });
});

describe("recurring tools", () => {
  test("create_recurring maps snake_case arguments", async () => {
    expect(await callJson("create_recurring", paycheck)).toEqual({
      id: 1,
      description: "Paycheck",
      type: "income",
      amount: 2000,
      startDate: "2025-03-07",
      interval: "biweekly",
      dayOfWeek: null,
      dayOfMonth: null,
      endDate: null,
      active: true,
    });
  });

  test("invalid series come back as tool errors", async () => {
    const { text, isError } = await call("create_recurring", { ...paycheck, amount: "-5" });

    expect(isError).toBe(true);
    expect(text).toBe("Error: Invalid recurring series: amount: amount must be greater than zero");
  });

  test("update_recurring reports an unknown id", async () => {
    const { text, isError } = await call("update_recurring", { id: 9, ...paycheck });

    expect(isError).toBe(true);
    expect(text).toBe("Error: Recurring series 9 not found");
  });

  test("paused series are skipped by get_upcoming_transactions", async () => {
    await callJson("create_recurring", paycheck);
    expect(await callJson("get_upcoming_transactions")).toEqual([
      {
        date: "2025-03-07",
        amount: 2000,
        description: "Paycheck",
        type: "income",
        source: "recurring",
        id: 1,
      },
    ]);

    await callJson("set_recurring_active", { id: 1, active: false });
    expect(await callJson("get_upcoming_transactions")).toEqual([]);
  });
});

describe("transaction tools", () => {
  test("add_expense rejects a zero amount", async () => {
    const { text, isError } = await call("add_expense", {
      date: "2025-03-03",
      amount: "0",
      description: "Nothing",
    });

    expect(isError).toBe(true);
    expect(text).toBe("Error: amount must be greater than zero");
  });

  test("delete_transaction reports an unknown id", async () => {
    const { text, isError } = await call("delete_transaction", { id: 42 });

    expect(isError).toBe(true);
    expect(text).toBe("Error: Transaction 42 not found");
  });

  test("get_transactions_between merges one-offs and projections", async () => {
    await callJson("create_recurring", paycheck);
    await callJson("add_expense", { date: "2025-03-07", amount: 80, description: "Dinner" });

    expect(
      await callJson("get_transactions_between", {
        start_date: "2025-03-07",
        end_date: "2025-03-20",
      })
    ).toEqual([
      {
        date: "2025-03-07",
        amount: -80,
        description: "Dinner",
        type: "expense",
        source: "transaction",
        id: 1,
      },
      {
        date: "2025-03-07",
        amount: 2000,
        description: "Paycheck",
        type: "income",
        source: "recurring",
        id: 1,
      },
    ]);
  });
});

describe("forecast tools", () => {
  test("get_forecast summarizes the window", async () => {
    await callJson("create_recurring", paycheck);
    await callJson("add_expense", { date: "2025-03-03", amount: "150", description: "Car repair" });

    const result = await callJson("get_forecast", { days: 7, starting_balance: "100" });

    expect(result).toMatchObject({
      summary: {
        startingBalance: 100,
        endingBalance: 1950,
        totalIncome: 2000,
        totalExpense: 150,
        netChange: 1850,
        lowestPoint: {
          lowestPoint: { date: "2025-03-03", change: -150, balance: -50 },
          dayIndex: 2,
        },
      },
    });
  });

  test("get_lowest_point uses the stored balance", async () => {
    await callJson("set_starting_balance", { balance: 500 });
    await callJson("add_expense", { date: "2025-03-05", amount: 600, description: "Insurance" });

    expect(await callJson("get_lowest_point", { days: 10 })).toEqual({
      lowestPoint: { date: "2025-03-05", change: -600, balance: -100 },
      dayIndex: 4,
    });
  });

  test("get_starting_balance defaults to zero", async () => {
    expect(await callJson("get_starting_balance")).toEqual({ balance: 0 });
  });
});

describe("resources", () => {
  test("finance://recurring lists every series", async () => {
    await callJson("create_recurring", { ...paycheck, active: false });

    const { contents } = await client.readResource({ uri: "finance://recurring" });
    const first: unknown = contents[0];
    if (
      typeof first !== "object" ||
      first === null ||
      !("text" in first) ||
      typeof first.text !== "string"
    ) {
      throw new Error("expected a text resource");
    }

    expect(JSON.parse(first.text)).toMatchObject([{ id: 1, description: "Paycheck", active: false }]);
  });
});
