import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { FinanceService } from "../service/finance.js";
import {
  registerBalanceTools,
  registerForecastTools,
  registerPrompts,
  registerRecurringTools,
  registerResources,
  registerTransactionTools,
} from "../tools/index.js";

const SERVER_NAME = "cashflow-forecast";
const SERVER_VERSION = "0.1.0";

/**
 * Create and configure a fully-loaded MCP server instance
 * with all tools, resources, and prompts registered.
 */
export function createMcpServer(service: FinanceService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Forecast tools: computed projections
  registerForecastTools(server, service);

  // Data tools: ledger and recurring series
  registerTransactionTools(server, service);
  registerRecurringTools(server, service);
  registerBalanceTools(server, service);

  // Resources: read-only data surfaces
  registerResources(server, service);

  // Prompts: canned analysis templates
  registerPrompts(server);

  return server;
}
