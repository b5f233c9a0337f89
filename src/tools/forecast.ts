import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { parseAmount } from "../engine/index.js";
import type { FinanceService } from "../service/finance.js";
import {
  forecastDayRecord,
  lowestPointRecord,
  summaryRecord,
} from "../service/records.js";
import { errorResult, jsonResult } from "./result.js";

export function registerForecastTools(server: McpServer, service: FinanceService) {
  server.registerTool(
    "get_forecast",
    {
      description:
        "Project the account balance day by day, combining one-off transactions with every active recurring series (paychecks, bills). Returns one entry per calendar day with the net change and the running balance, plus totals and the lowest point in the window. Use this when the user asks what their balance will look like, whether they can afford something, or when money gets tight.",
      inputSchema: {
        days: z
          .number()
          .int()
          .min(1)
          .max(3660)
          .optional()
          .describe("Number of days to project, starting with the start date. Defaults to the configured window (90 days)."),
        start_date: z
          .string()
          .optional()
          .describe("First day of the forecast in YYYY-MM-DD format. Defaults to today (UTC)."),
        starting_balance: z
          .union([z.number(), z.string()])
          .optional()
          .describe("Balance at the start of the first day. Defaults to the stored starting balance, or 0 if none is recorded."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ days, start_date, starting_balance }) => {
      try {
        const result = await service.forecast({
          days,
          startDate: start_date,
          startingBalance:
            starting_balance === undefined ? undefined : parseAmount(starting_balance),
        });
        return jsonResult({
          summary: summaryRecord(result.summary),
          days: result.days.map(forecastDayRecord),
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "get_lowest_point",
    {
      description:
        "Find the day with the lowest projected balance in the upcoming forecast window. Ties resolve to the earliest day. Use this to warn the user about an upcoming overdraft or to find the safest day for a large purchase.",
      inputSchema: {
        days: z
          .number()
          .int()
          .min(1)
          .max(3660)
          .optional()
          .describe("Number of days to scan, starting today. Defaults to the configured window (90 days)."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ days }) => {
      try {
        const lowest = await service.lowestPointAhead(days);
        return jsonResult(lowestPointRecord(lowest));
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
