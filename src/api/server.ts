// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { DashboardProfile } from "../core/types.js";
import type { DatasetSession } from "../session/dataset-session.js";
import type { DatasetLoader } from "../session/dataset-loader.js";
import type { ChartRenderer } from "../render/chart-renderer.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger, type AppEnv } from "../logging/context.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { renderDashboardPage } from "./dashboard-page.js";

import { overviewRoutes } from "./routes/overview.js";
import { searchRoutes } from "./routes/search.js";
import { statisticsRoutes } from "./routes/statistics.js";
import { aboutRoutes } from "./routes/about.js";
import { datasetRoutes } from "./routes/dataset.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  session: DatasetSession;
  loader: DatasetLoader;
  renderer: ChartRenderer;
  profile: DashboardProfile;
  logger: pino.Logger;
  uploadMaxBytes: number;
  isProduction: boolean;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers; page routes answer 404 when the profile disables them.
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  const page = renderDashboardPage(deps.profile);

  app.get("/", (c) => {
    const accept = c.req.header("accept") ?? "";
    const wantsHtml = accept.includes("text/html") || accept.includes("*/*");

    if (!wantsHtml) {
      return c.json({
        name: deps.profile.title,
        service: "inscriptions-dashboard",
        pages: deps.profile.pages,
        routes: [
          ...deps.profile.pages.map((p) => `/api/${p}`),
          "/api/search/export",
          "/api/dataset",
          "/health",
        ],
      });
    }

    return c.html(page);
  });

  app.route(
    "/api/overview",
    overviewRoutes({ session: deps.session, renderer: deps.renderer, profile: deps.profile }),
  );

  app.route(
    "/api/search",
    searchRoutes({ session: deps.session, profile: deps.profile, logger: deps.logger }),
  );

  app.route(
    "/api/statistics",
    statisticsRoutes({ session: deps.session, renderer: deps.renderer, profile: deps.profile }),
  );

  app.route(
    "/api/about",
    aboutRoutes({ session: deps.session, profile: deps.profile }),
  );

  app.route(
    "/api/dataset",
    datasetRoutes({
      session: deps.session,
      loader: deps.loader,
      uploadMaxBytes: deps.uploadMaxBytes,
      logger: deps.logger,
    }),
  );

  app.route("/health", healthRoutes({ session: deps.session }));

  // ── Fallbacks ─────────────────────────────────────────────────────────

  app.notFound((c) => c.json({ error: "Not found", type: "not_found" }, 404));
  app.onError(createErrorHandler(deps.logger, deps.isProduction));

  return app;
}
