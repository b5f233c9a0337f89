import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  type JSONRPCMessage,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";

interface Pending {
  resolve: (response: JSONRPCMessage) => void;
  timer: NodeJS.Timeout;
}

/**
 * A lightweight request/response HTTP transport for MCP.
 *
 * Bridges individual HTTP requests to the MCP Server's transport interface.
 * Each JSON-RPC request gets a response via a Promise-based dispatch.
 */
export class HttpTransport implements Transport {
  private pendingResponses = new Map<RequestId, Pending>();

  onmessage?: (message: JSONRPCMessage) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(private readonly timeoutMs = 60_000) {}

  async start(): Promise<void> {
    // No-op: HTTP transport is request-driven
  }

  async close(): Promise<void> {
    // Answer any pending requests before closing
    for (const [id, pending] of this.pendingResponses) {
      clearTimeout(pending.timer);
      pending.resolve(errorResponse(id, "Transport closed"));
    }
    this.pendingResponses.clear();
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    // The MCP server sends a response; route it to the waiting HTTP request
    if (isJSONRPCResponse(message) || isJSONRPCError(message)) {
      const id = message.id;
      const pending = id === undefined ? undefined : this.pendingResponses.get(id);
      if (id !== undefined && pending) {
        clearTimeout(pending.timer);
        this.pendingResponses.delete(id);
        pending.resolve(message);
      }
    }
    // Notifications and server-initiated requests are dropped in HTTP mode
  }

  /**
   * Handle an incoming JSON-RPC message from an HTTP POST.
   * Returns the JSON-RPC response, or null for a notification.
   */
  async handleJsonRpc(body: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    if (!isJSONRPCRequest(body)) {
      // Notification (or a stray response): nothing to answer
      this.onmessage?.(body);
      return null;
    }

    const id = body.id;
    return new Promise<JSONRPCMessage>((resolve) => {
      // Safety timeout so we don't hang forever
      const timer = setTimeout(() => {
        if (this.pendingResponses.delete(id)) {
          resolve(errorResponse(id, "Request timed out"));
        }
      }, this.timeoutMs);
      timer.unref();

      // Set up response handler BEFORE dispatching the message
      this.pendingResponses.set(id, { resolve, timer });
      this.onmessage?.(body);
    });
  }
}

function errorResponse(id: RequestId, message: string): JSONRPCMessage {
  return { jsonrpc: "2.0", id, error: { code: -32000, message } };
}
