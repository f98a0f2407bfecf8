// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type pino from "pino";

/** Variables the global middleware stack sets on every request context. */
export interface AppEnv {
  Variables: {
    requestId: string;
    logger: pino.Logger;
  };
}

/**
 * Creates a Hono middleware that attaches a request-scoped child logger
 * carrying `requestId`, `method` and `path` to every request context.
 *
 * Must run after `requestIdMiddleware`, whose ID it reuses.
 */
export function createRequestLogger(
  baseLogger: pino.Logger,
): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const childLogger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });

    c.set("logger", childLogger);

    const start = Date.now();
    childLogger.debug("request started");

    await next();

    const durationMs = Date.now() - start;
    const level = c.res.status >= 500 ? "error" : "info";
    childLogger[level]({ durationMs, status: c.res.status }, "request completed");
  };
}
