// ---------------------------------------------------------------------------
// Shared fixtures for unit and integration tests.
// ---------------------------------------------------------------------------

import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { Hono } from "hono";

import type { Dataset, DashboardProfile, LoadedDataset } from "../src/core/types.js";
import { DatasetSourceKind } from "../src/core/types.js";
import { parseDashboardProfile } from "../src/config/dashboard-profile.js";
import { DatasetSession } from "../src/session/dataset-session.js";
import { createDataset } from "../src/domain/dataset/dataset.js";
import { sampleDataset } from "../src/domain/dataset/sample-data.js";
import { DatasetCache } from "../src/cache/dataset-cache.js";
import { DatasetLoader } from "../src/session/dataset-loader.js";
import { createChartRenderer } from "../src/render/chart-renderer.js";
import { createApp } from "../src/api/server.js";
import type { AppEnv } from "../src/logging/context.js";

export function silentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/** A validated profile with every page on, overridable per test. */
export function testProfile(overrides: Record<string, unknown> = {}): DashboardProfile {
  return parseDashboardProfile(
    {
      title: "Test Dashboard",
      chartStyle: "bar",
      pages: ["overview", "search", "statistics", "about"],
      statistics: {
        sections: [
          { field: "gender", label: "Gender Distribution" },
          { field: "case", label: "Grammatical Cases" },
        ],
      },
      about: { text: "About the test data." },
      ...overrides,
    },
    "test",
  );
}

export function loadedFrom(dataset: Dataset, label = "test.csv"): LoadedDataset {
  return {
    dataset,
    source: { kind: DatasetSourceKind.FILE, label },
    loadedAt: "2024-01-01T00:00:00.000Z",
    notice: { level: "success", message: "Real data loaded!" },
  };
}

export function sessionWith(dataset: Dataset): DatasetSession {
  return new DatasetSession(loadedFrom(dataset), silentLogger());
}

/** Four rows with a missing gender and a missing year. */
export function sparseDataset(): Dataset {
  return createDataset(
    ["person_id", "name", "gender", "year"],
    [
      { person_id: 1, name: "Aulus", gender: "Male", year: 100 },
      { person_id: 2, name: "Fabia", gender: null, year: 100 },
      { person_id: 3, name: "Sextus", gender: "Male", year: null },
      { person_id: 4, name: "Valeria", gender: "Female", year: 150 },
    ],
  );
}

export interface TestAppOptions {
  dataset?: Dataset;
  profile?: DashboardProfile;
  uploadMaxBytes?: number;
  isProduction?: boolean;
}

/**
 * The full application over an in-memory session. The loader points at a
 * file that does not exist, so reloads fall back to the sample data.
 */
export function testApp(options: TestAppOptions = {}): {
  app: Hono<AppEnv>;
  session: DatasetSession;
} {
  const logger = silentLogger();
  const profile = options.profile ?? testProfile();
  const uploadMaxBytes = options.uploadMaxBytes ?? 1024 * 1024;
  const session = new DatasetSession(loadedFrom(options.dataset ?? sampleDataset()), logger);
  const cache = new DatasetCache(
    { enabled: true, maxMemoryEntries: 4, datasetTtlSeconds: 60 },
    logger,
  );
  const loader = new DatasetLoader(
    {
      path: path.join(os.tmpdir(), "inscriptions-test-missing", "inscriptions.csv"),
      fallback: "sample",
      uploadMaxBytes,
    },
    cache,
    logger,
  );

  const app = createApp({
    session,
    loader,
    renderer: createChartRenderer(profile.chartStyle, profile.overview.histogramBins),
    profile,
    logger,
    uploadMaxBytes,
    isProduction: options.isProduction ?? false,
  });

  return { app, session };
}
