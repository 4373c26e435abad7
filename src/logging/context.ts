// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type pino from "pino";
import type { AppEnv } from "../api/env.js";

/**
 * Attaches a child logger bound to `requestId`, `method` and `path`.
 * Must run after the request ID middleware. Handlers read it with
 * `c.get("logger")`.
 */
export function createRequestLogger(baseLogger: pino.Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const childLogger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });
    c.set("logger", childLogger);

    const start = performance.now();
    childLogger.debug("request started");

    await next();

    const durationMs = Math.round(performance.now() - start);
    childLogger.info({ durationMs, status: c.res.status }, "request completed");
  };
}
