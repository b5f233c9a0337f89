import type { MiddlewareHandler } from "hono";
import type { Logger } from "../logger.js";

/**
 * Structured audit logging middleware.
 *
 * Emits one log line per request with timing, status, method, path,
 * and client IP.
 */
export function auditLog(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip =
      c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
      c.req.header("x-real-ip") ||
      "unknown";

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;
    const fields = { method, path, status, duration, ip };

    if (status >= 500) logger.error("request", fields);
    else if (status >= 400) logger.warn("request", fields);
    else logger.info("request", fields);
  };
}
