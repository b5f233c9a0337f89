import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { centsToNumber, parseAmount } from "../engine/index.js";
import type { FinanceService } from "../service/finance.js";
import { errorResult, jsonResult } from "./result.js";

export function registerBalanceTools(server: McpServer, service: FinanceService) {
  server.registerTool(
    "get_starting_balance",
    {
      description:
        "Get the balance forecasts start from. Returns 0 if no balance has been recorded yet.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      try {
        const balance = await service.getStartingBalance();
        return jsonResult({ balance: centsToNumber(balance) });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "set_starting_balance",
    {
      description:
        "Record the current account balance. Forecasts start from this value.",
      inputSchema: {
        balance: z
          .union([z.number(), z.string()])
          .describe("Current balance; may be negative, e.g. -120.50."),
      },
    },
    async ({ balance }) => {
      try {
        const cents = parseAmount(balance);
        await service.setStartingBalance(cents);
        return jsonResult({ status: "success", balance: centsToNumber(cents) });
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
