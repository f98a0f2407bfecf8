// ---------------------------------------------------------------------------
// Health check route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { DatasetSession } from "../../session/dataset-session.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  session: DatasetSession;
}

const startedAt = Date.now();

/**
 * Mounts `GET /health`: a liveness probe that also reports the size and
 * origin of the session's dataset.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono {
  const app = new Hono();

  app.get("/", (c) => {
    const { dataset, source } = deps.session.loaded;

    return c.json({
      status: "ok",
      uptime: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
      dataset: {
        source: source.kind,
        rows: dataset.rows.length,
      },
    });
  });

  return app;
}
