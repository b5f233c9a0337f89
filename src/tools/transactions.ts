import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { parseAmount } from "../engine/index.js";
import type { FinanceService } from "../service/finance.js";
import { occurrenceRecord, transactionRecord } from "../service/records.js";
import { errorResult, jsonResult } from "./result.js";

const entrySchema = {
  date: z.string().describe("Date of the transaction in YYYY-MM-DD format."),
  amount: z
    .union([z.number(), z.string()])
    .describe("Positive amount, e.g. 42.50 or \"42,50\". The sign comes from the tool used."),
  description: z.string().min(1).max(200).describe("Short description, e.g. \"Car repair\"."),
};

export function registerTransactionTools(server: McpServer, service: FinanceService) {
  server.registerTool(
    "list_transactions",
    {
      description:
        "List every recorded one-off transaction (not the recurring series) ordered by date. Expenses have negative amounts.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      try {
        const transactions = await service.listTransactions();
        return jsonResult(transactions.map(transactionRecord));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "get_transactions_between",
    {
      description:
        "Get one-off transactions and projected recurring occurrences between two dates (both inclusive), merged in date order. Each entry says whether it is a recorded transaction or projected from a recurring series.",
      inputSchema: {
        start_date: z.string().describe("First day in YYYY-MM-DD format."),
        end_date: z.string().describe("Last day in YYYY-MM-DD format."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ start_date, end_date }) => {
      try {
        const occurrences = await service.transactionsBetween(start_date, end_date);
        return jsonResult(occurrences.map(occurrenceRecord));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "get_upcoming_transactions",
    {
      description:
        "Get everything expected from today through the next N days: recorded one-offs plus projected paychecks and bills. Use this for \"what's coming up\" questions.",
      inputSchema: {
        days: z
          .number()
          .int()
          .min(0)
          .max(3660)
          .optional()
          .describe("How many days ahead to look. Defaults to 30."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ days }) => {
      try {
        const occurrences = await service.upcomingTransactions(days);
        return jsonResult(occurrences.map(occurrenceRecord));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "add_income",
    {
      description: "Record a one-off income (refund, bonus, gift) on a given date.",
      inputSchema: entrySchema,
    },
    async ({ date, amount, description }) => {
      try {
        const tx = await service.addIncome(date, parseAmount(amount), description);
        return jsonResult(transactionRecord(tx));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "add_expense",
    {
      description:
        "Record a one-off expense on a given date. Pass the amount as a positive number; it is stored as negative.",
      inputSchema: entrySchema,
    },
    async ({ date, amount, description }) => {
      try {
        const tx = await service.addExpense(date, parseAmount(amount), description);
        return jsonResult(transactionRecord(tx));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "delete_transaction",
    {
      description: "Delete a one-off transaction by id.",
      inputSchema: {
        id: z.number().int().positive().describe("Transaction id from list_transactions."),
      },
      annotations: { destructiveHint: true },
    },
    async ({ id }) => {
      try {
        const deleted = await service.deleteTransaction(id);
        if (!deleted) return errorResult(`Transaction ${id} not found`);
        return jsonResult({ status: "success", id });
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
