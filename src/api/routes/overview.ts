// ---------------------------------------------------------------------------
// Overview page routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { DashboardProfile } from "../../core/types.js";
import { InscriptionField } from "../../core/types.js";
import type { DatasetSession } from "../../session/dataset-session.js";
import type { ChartRenderer } from "../../render/chart-renderer.js";
import {
  countEqual,
  recentRecords,
  summaryMetrics,
  timeSeriesCounts,
} from "../../domain/query/query-engine.js";
import { requirePage } from "../page-guard.js";

/** Dependencies required by overview routes. */
export interface OverviewRouteDeps {
  session: DatasetSession;
  renderer: ChartRenderer;
  profile: DashboardProfile;
}

/**
 * Mounts the overview endpoint:
 *
 * - `GET /api/overview` -- Headline metrics, year chart, most recent records.
 */
export function overviewRoutes(deps: OverviewRouteDeps): Hono {
  const app = new Hono();
  const { recentCount, yearField } = deps.profile.overview;

  app.use("*", requirePage(deps.profile, "overview"));

  app.get("/", (c) => {
    const { dataset, source, notice } = deps.session.loaded;

    return c.json({
      title: deps.profile.title,
      source,
      notice,
      metrics: {
        ...summaryMetrics(dataset),
        maleCount: countEqual(dataset, InscriptionField.GENDER, "Male"),
        femaleCount: countEqual(dataset, InscriptionField.GENDER, "Female"),
      },
      timeline: deps.renderer.timeline(
        timeSeriesCounts(dataset, yearField),
        "Inscriptions Over Time",
      ),
      recent: {
        columns: dataset.columns,
        rows: recentRecords(dataset, recentCount, yearField).rows,
      },
    });
  });

  return app;
}
