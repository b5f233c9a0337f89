import { Hono } from "hono";
import { z } from "zod";
import {
  centsToNumber,
  ConfigurationError,
  EmptyInputError,
  parseAmount,
} from "../engine/index.js";
import { errorFields, type Logger } from "../logger.js";
import type { FinanceService } from "../service/finance.js";
import {
  forecastDayRecord,
  lowestPointRecord,
  occurrenceRecord,
  seriesRecord,
  transactionRecord,
} from "../service/records.js";

const Amount = z.union([z.number().finite(), z.string()]);

const TransactionBody = z.object({
  date: z.string(),
  amount: Amount,
  description: z.string().trim().min(1, "description is required").max(200),
});

const BalanceBody = z.object({ balance: Amount });

const ActiveBody = z.object({ active: z.boolean() });

const DaysQuery = z.coerce.number().int().min(0).max(3660).optional();

class BadRequestError extends Error {}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BadRequestError(
      parsed.error.issues
        .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; "),
    );
  }
  return parsed.data;
}

function parseDays(raw: string | undefined): number | undefined {
  const parsed = DaysQuery.safeParse(raw === "" ? undefined : raw);
  if (!parsed.success) throw new BadRequestError(`Invalid days: ${raw}`);
  return parsed.data;
}

/**
 * REST API over the finance service. Amounts in and out are display
 * numbers; everything in between is cents.
 */
export function apiRoutes(service: FinanceService, logger: Logger): Hono {
  const api = new Hono();

  // ── Transactions ──
  api.get("/transactions", async (c) => {
    const transactions = await service.listTransactions();
    return c.json(transactions.map(transactionRecord));
  });

  api.post("/transactions/income", async (c) => {
    const body = parseBody(TransactionBody, await c.req.json().catch(() => null));
    const tx = await service.addIncome(body.date, parseAmount(body.amount), body.description);
    return c.json({ status: "success", transaction: transactionRecord(tx) }, 201);
  });

  api.post("/transactions/expense", async (c) => {
    const body = parseBody(TransactionBody, await c.req.json().catch(() => null));
    const tx = await service.addExpense(body.date, parseAmount(body.amount), body.description);
    return c.json({ status: "success", transaction: transactionRecord(tx) }, 201);
  });

  api.delete("/transactions/:id{[0-9]+}", async (c) => {
    const id = Number(c.req.param("id"));
    if (!(await service.deleteTransaction(id))) {
      return c.json({ error: `Transaction ${id} not found` }, 404);
    }
    return c.json({ status: "success" });
  });

  api.get("/transactions/between", async (c) => {
    const start = c.req.query("start");
    const end = c.req.query("end");
    if (!start || !end) {
      return c.json(
        { error: "Both 'start' and 'end' query parameters are required" },
        400
      );
    }
    const occurrences = await service.transactionsBetween(start, end);
    return c.json(occurrences.map(occurrenceRecord));
  });

  api.get("/transactions/upcoming", async (c) => {
    const occurrences = await service.upcomingTransactions(parseDays(c.req.query("days")));
    return c.json(occurrences.map(occurrenceRecord));
  });

  // ── Balance ──
  api.get("/balance", async (c) => {
    const balance = await service.getStartingBalance();
    return c.json({ balance: centsToNumber(balance) });
  });

  api.put("/balance", async (c) => {
    const body = parseBody(BalanceBody, await c.req.json().catch(() => null));
    await service.setStartingBalance(parseAmount(body.balance));
    return c.json({ status: "success" });
  });

  // ── Recurring ──
  api.get("/recurring", async (c) => {
    const series = await service.listRecurring();
    return c.json(series.map(seriesRecord));
  });

  api.post("/recurring", async (c) => {
    const series = await service.createRecurring(await c.req.json().catch(() => null));
    return c.json(seriesRecord(series), 201);
  });

  api.put("/recurring/:id{[0-9]+}", async (c) => {
    const id = Number(c.req.param("id"));
    const series = await service.updateRecurring(id, await c.req.json().catch(() => null));
    if (!series) return c.json({ error: `Recurring series ${id} not found` }, 404);
    return c.json(seriesRecord(series));
  });

  api.delete("/recurring/:id{[0-9]+}", async (c) => {
    const id = Number(c.req.param("id"));
    if (!(await service.deleteRecurring(id))) {
      return c.json({ error: `Recurring series ${id} not found` }, 404);
    }
    return c.json({ status: "success" });
  });

  api.put("/recurring/:id{[0-9]+}/active", async (c) => {
    const id = Number(c.req.param("id"));
    const body = parseBody(ActiveBody, await c.req.json().catch(() => null));
    if (!(await service.setRecurringActive(id, body.active))) {
      return c.json({ error: `Recurring series ${id} not found` }, 404);
    }
    return c.json({ status: "success" });
  });

  // ── Forecast ──
  api.get("/forecast", async (c) => {
    const { days } = await service.forecast({
      days: parseDays(c.req.query("days")),
      startDate: c.req.query("start") || undefined,
    });
    return c.json(days.map(forecastDayRecord));
  });

  api.get("/forecast/lowest", async (c) => {
    const lowest = await service.lowestPointAhead(parseDays(c.req.query("days")));
    return c.json(lowestPointRecord(lowest));
  });

  api.onError((err, c) => {
    if (
      err instanceof BadRequestError ||
      err instanceof ConfigurationError ||
      err instanceof RangeError
    ) {
      return c.json({ error: err.message }, 400);
    }
    if (err instanceof EmptyInputError) {
      return c.json({ error: err.message }, 422);
    }
    logger.error("request failed", { path: c.req.path, ...errorFields(err) });
    return c.json({ error: err.message }, 500);
  });

  return api;
}
