import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { FinanceService } from "../service/finance.js";
import { seriesRecord } from "../service/records.js";
import { errorResult, jsonResult } from "./result.js";

// Loose on purpose: the service validates and reports every bad field.
const seriesSchema = {
  description: z.string().describe("What the series is, e.g. \"Paycheck\" or \"Rent\"."),
  type: z.string().describe("\"income\" or \"expense\"."),
  amount: z
    .union([z.number(), z.string()])
    .describe("Positive amount per occurrence; expenses are subtracted automatically."),
  start_date: z
    .string()
    .describe("First occurrence in YYYY-MM-DD format. Also the phase anchor for weekly/biweekly series."),
  interval: z.string().describe("One of weekly, biweekly, monthly, yearly."),
  day_of_week: z
    .number()
    .int()
    .optional()
    .describe("Weekly/biweekly only: pin to a weekday, 0 = Sunday … 6 = Saturday."),
  day_of_month: z
    .number()
    .int()
    .optional()
    .describe("Monthly/yearly only: pin to a day 1-31. Short months clamp to their last day."),
  end_date: z
    .string()
    .optional()
    .describe("Last possible occurrence (inclusive) in YYYY-MM-DD format."),
  active: z.boolean().optional().describe("Whether the series counts in forecasts. Defaults to true."),
};

interface SeriesArgs {
  description: string;
  type: string;
  amount: number | string;
  start_date: string;
  interval: string;
  day_of_week?: number;
  day_of_month?: number;
  end_date?: string;
  active?: boolean;
}

function toSeriesInput(args: SeriesArgs) {
  return {
    description: args.description,
    direction: args.type,
    amount: args.amount,
    startDate: args.start_date,
    interval: args.interval,
    dayOfWeek: args.day_of_week,
    dayOfMonth: args.day_of_month,
    endDate: args.end_date,
    active: args.active,
  };
}

export function registerRecurringTools(server: McpServer, service: FinanceService) {
  server.registerTool(
    "list_recurring",
    {
      description:
        "List all recurring series (paychecks, bills, subscriptions) with their interval, amount, anchor date, optional weekday/day-of-month pin, end date and whether they are active.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      try {
        const series = await service.listRecurring();
        return jsonResult(series.map(seriesRecord));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "create_recurring",
    {
      description:
        "Create a recurring income or expense. Weekly and biweekly series step from the start date; monthly and yearly series land on the start date's day (or day_of_month), clamped to short months.",
      inputSchema: seriesSchema,
    },
    async (args) => {
      try {
        const series = await service.createRecurring(toSeriesInput(args));
        return jsonResult(seriesRecord(series));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "update_recurring",
    {
      description: "Replace every field of an existing recurring series.",
      inputSchema: {
        id: z.number().int().positive().describe("Series id from list_recurring."),
        ...seriesSchema,
      },
    },
    async ({ id, ...args }) => {
      try {
        const series = await service.updateRecurring(id, toSeriesInput(args));
        if (!series) return errorResult(`Recurring series ${id} not found`);
        return jsonResult(seriesRecord(series));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "delete_recurring",
    {
      description: "Delete a recurring series by id.",
      inputSchema: {
        id: z.number().int().positive().describe("Series id from list_recurring."),
      },
      annotations: { destructiveHint: true },
    },
    async ({ id }) => {
      try {
        const deleted = await service.deleteRecurring(id);
        if (!deleted) return errorResult(`Recurring series ${id} not found`);
        return jsonResult({ status: "success", id });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "set_recurring_active",
    {
      description:
        "Pause or resume a recurring series. Inactive series are kept but left out of forecasts.",
      inputSchema: {
        id: z.number().int().positive().describe("Series id from list_recurring."),
        active: z.boolean().describe("true to include the series in forecasts, false to pause it."),
      },
    },
    async ({ id, active }) => {
      try {
        const updated = await service.setRecurringActive(id, active);
        if (!updated) return errorResult(`Recurring series ${id} not found`);
        return jsonResult({ status: "success", id, active });
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
