#!/usr/bin/env node
/**
 * Cashflow Forecast MCP Server
 *
 * Projects recurring income and expenses over a window and forecasts the
 * daily running balance. Supports dual transport: stdio (local MCP clients)
 * and HTTP (MCP over POST /mcp plus a REST API under /api).
 *
 * Usage:
 *   node dist/index.js --transport stdio   # Local
 *   node dist/index.js --transport http    # Remote (HTTP server on port 3200)
 */

import { serve } from "@hono/node-server";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, type Config } from "./config.js";
import { createApp } from "./http/app.js";
import { createLogger, errorFields, type Logger } from "./logger.js";
import { McpSessions } from "./mcp/sessions.js";
import { createMcpServer } from "./mcp/server.js";
import { FinanceService } from "./service/finance.js";
import { SqliteFinanceStore } from "./store/sqlite.js";

const SESSION_IDLE_MS = 30 * 60_000;
const SWEEP_INTERVAL_MS = 5 * 60_000;

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const store = await SqliteFinanceStore.open(config.dbPath);
  const service = new FinanceService(store, {
    forecastDays: config.forecast.days,
    upcomingDays: config.forecast.upcomingDays,
  });

  if (config.server.transport === "stdio") {
    await startStdio(service, store, logger);
  } else {
    startHttp(config, service, store, logger);
  }
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio(
  service: FinanceService,
  store: SqliteFinanceStore,
  logger: Logger,
): Promise<void> {
  const server = createMcpServer(service);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("mcp server ready", { transport: "stdio" });

  process.on("SIGINT", () => {
    server
      .close()
      .then(() => {
        store.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error("shutdown failed", errorFields(error));
        process.exit(1);
      });
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

function startHttp(
  config: Config,
  service: FinanceService,
  store: SqliteFinanceStore,
  logger: Logger,
): void {
  const sessions = new McpSessions(() => createMcpServer(service));
  const app = createApp({
    service,
    sessions,
    logger,
    corsOrigins: config.server.corsOrigins,
  });

  // Close idle MCP sessions every 5 minutes
  const sweeper = setInterval(() => {
    sessions
      .sweep(SESSION_IDLE_MS)
      .then((closed) => {
        if (closed > 0) logger.info("closed idle mcp sessions", { closed });
      })
      .catch((error: unknown) => logger.error("session sweep failed", errorFields(error)));
  }, SWEEP_INTERVAL_MS);
  sweeper.unref();

  const port = config.server.port;
  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info("http server listening", {
      url: `http://localhost:${info.port}`,
      mcp: "POST /mcp",
      api: "/api",
      health: "GET /health",
    });
  });

  process.on("SIGINT", () => {
    clearInterval(sweeper);
    server.close();
    sessions
      .closeAll()
      .then(() => {
        store.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error("shutdown failed", errorFields(error));
        process.exit(1);
      });
  });
}

main().catch((error: unknown) => {
  createLogger("error").error("startup failed", errorFields(error));
  process.exit(1);
});
