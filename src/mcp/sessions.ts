import { randomUUID } from "node:crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { HttpTransport } from "./transport.js";

interface McpSession {
  server: McpServer;
  transport: HttpTransport;
  lastAccess: number;
}

/**
 * MCP sessions keyed by the `Mcp-Session-Id` header. Each session owns
 * its own server instance connected to an HttpTransport.
 */
export class McpSessions {
  private sessions = new Map<string, McpSession>();

  constructor(
    private readonly createServer: () => McpServer,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  /** Existing session for `sessionId`, or a freshly connected one. */
  async resolve(
    sessionId: string | undefined,
  ): Promise<{ id: string; transport: HttpTransport; created: boolean }> {
    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (sessionId && existing) {
      existing.lastAccess = this.now();
      return { id: sessionId, transport: existing.transport, created: false };
    }

    const id = randomUUID();
    const server = this.createServer();
    const transport = new HttpTransport();
    await server.connect(transport);
    this.sessions.set(id, { server, transport, lastAccess: this.now() });
    return { id, transport, created: true };
  }

  /** Close sessions idle for longer than `maxIdleMs`; returns how many. */
  async sweep(maxIdleMs: number): Promise<number> {
    const cutoff = this.now() - maxIdleMs;
    let closed = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastAccess < cutoff) {
        this.sessions.delete(id);
        await session.server.close();
        closed++;
      }
    }
    return closed;
  }

  async closeAll(): Promise<void> {
    const all = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(all.map((s) => s.server.close()));
  }
}
