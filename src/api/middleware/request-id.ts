// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { AppEnv } from "../../logging/context.js";

/** Client-supplied IDs must be short and free of control characters. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that stores a request ID on the context as
 * `"requestId"` and echoes it in the `X-Request-ID` response header.
 *
 * An incoming `X-Request-ID` is reused when it matches
 * {@link SAFE_REQUEST_ID_RE}; otherwise a fresh UUID is generated.
 */
export function requestIdMiddleware(): (
  c: Context<AppEnv>,
  next: Next,
) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing) ? existing : randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
