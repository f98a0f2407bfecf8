// ---------------------------------------------------------------------------
// Inscriptions Dashboard -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";

import type { AppConfig } from "./core/types.js";
import type { AppEnv } from "./logging/context.js";
import { loadConfig } from "./config/config.js";
import { loadDashboardProfile } from "./config/dashboard-profile.js";
import { createLogger } from "./logging/logger.js";
import { DatasetCache } from "./cache/dataset-cache.js";
import { DatasetLoader } from "./session/dataset-loader.js";
import { DatasetSession } from "./session/dataset-session.js";
import { createChartRenderer } from "./render/chart-renderer.js";
import { createApp } from "./api/server.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  config: AppConfig;
}

export async function buildApp(config: AppConfig = loadConfig()): Promise<BuiltApp> {
  // 1. Create logger
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
  });

  // 2. Load the dashboard profile (page set, chart style, sections)
  const profile = loadDashboardProfile(config.profile);
  logger.info(
    { profile: config.profile, pages: profile.pages, chartStyle: profile.chartStyle },
    "dashboard profile loaded",
  );

  // 3. Load the initial dataset; falls back instead of failing
  const cache = new DatasetCache(config.cache, logger.child({ module: "cache" }));
  const loader = new DatasetLoader(config.dataset, cache, logger.child({ module: "loader" }));
  const initial = await loader.loadFromFile();
  const session = new DatasetSession(initial, logger.child({ module: "session" }));

  // 4. Pick the chart renderer for this profile
  const renderer = createChartRenderer(profile.chartStyle, profile.overview.histogramBins);

  // 5. Create Hono app
  const app = createApp({
    session,
    loader,
    renderer,
    profile,
    logger,
    uploadMaxBytes: config.dataset.uploadMaxBytes,
    isProduction: config.env === "production",
  });

  // 6. Log startup summary
  logger.info(
    {
      port: config.port,
      env: config.env,
      source: initial.source.kind,
      rows: initial.dataset.rows.length,
      columns: initial.dataset.columns.length,
    },
    "inscriptions-dashboard ready",
  );

  return { app, config };
}
