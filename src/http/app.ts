import { Hono } from "hono";
import { cors } from "hono/cors";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "../logger.js";
import type { McpSessions } from "../mcp/sessions.js";
import { auditLog } from "../middleware/audit.js";
import type { FinanceService } from "../service/finance.js";
import { apiRoutes } from "./routes.js";

export interface AppOptions {
  service: FinanceService;
  sessions: McpSessions;
  logger: Logger;
  corsOrigins: string[];
}

export function createApp({ service, sessions, logger, corsOrigins }: AppOptions): Hono {
  const app = new Hono();

  // ── Middleware ──
  app.use(auditLog(logger));
  app.use(
    cors({
      origin: corsOrigins.includes("*") ? "*" : corsOrigins,
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Mcp-Session-Id"],
      exposeHeaders: ["Mcp-Session-Id"],
    })
  );

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({
      status: "ok",
      server: "cashflow-forecast",
      version: "0.1.0",
    })
  );

  // ── MCP endpoint (Streamable HTTP) ──
  app.post("/mcp", async (c) => {
    const parsed = JSONRPCMessageSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Invalid JSON-RPC message" } },
        400
      );
    }

    const session = await sessions.resolve(c.req.header("mcp-session-id"));
    if (session.created) {
      logger.debug("mcp session opened", { sessionId: session.id });
    }

    const response = await session.transport.handleJsonRpc(parsed.data);
    c.header("mcp-session-id", session.id);
    if (response === null) {
      return c.body(null, 202);
    }
    return c.json(response);
  });

  // ── REST API ──
  app.route("/api", apiRoutes(service, logger));

  return app;
}
