/**
 * Structured logging middleware.
 *
 * Uses pino for JSON-structured request logging.
 * Creates a child logger with requestId context per request.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
}

/**
 * Exposes a request-scoped child logger as `c.get("logger")` and logs
 * each completed request. The request id rides on the child's bindings.
 */
export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const requestId = c.get("requestId");
    const requestLogger = logger.child({ requestId });
    c.set("logger", requestLogger);

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    };

    const level = entry.status >= 500 ? "error" : entry.status >= 400 ? "warn" : "info";
    requestLogger[level](entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
  };
}
