// ---------------------------------------------------------------------------
// Statistics page routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type {
  CategoryCount,
  ChartSpec,
  DashboardProfile,
  Dataset,
  StatisticsSection,
} from "../../core/types.js";
import { InscriptionField } from "../../core/types.js";
import type { DatasetSession } from "../../session/dataset-session.js";
import type { ChartRenderer } from "../../render/chart-renderer.js";
import {
  categoricalAggregate,
  countEqual,
  yearSummary,
} from "../../domain/query/query-engine.js";
import { hasColumn } from "../../domain/dataset/dataset.js";
import { requirePage } from "../page-guard.js";

/** Dependencies required by statistics routes. */
export interface StatisticsRouteDeps {
  session: DatasetSession;
  renderer: ChartRenderer;
  profile: DashboardProfile;
}

interface SectionResult {
  field: string;
  label: string;
  available: boolean;
  breakdown: CategoryCount[];
  chart: ChartSpec | null;
}

function buildSection(
  dataset: Dataset,
  section: StatisticsSection,
  renderer: ChartRenderer,
): SectionResult {
  if (!hasColumn(dataset, section.field)) {
    return { field: section.field, label: section.label, available: false, breakdown: [], chart: null };
  }

  const breakdown = categoricalAggregate(dataset, section.field);
  return {
    field: section.field,
    label: section.label,
    available: true,
    breakdown,
    chart: renderer.breakdown(section, breakdown),
  };
}

/**
 * Mounts the statistics endpoint:
 *
 * - `GET /api/statistics` -- Per-section breakdowns with charts, gender
 *   counts, and the year summary.
 */
export function statisticsRoutes(deps: StatisticsRouteDeps): Hono {
  const app = new Hono();

  app.use("*", requirePage(deps.profile, "statistics"));

  app.get("/", (c) => {
    const dataset = deps.session.dataset;

    return c.json({
      sections: deps.profile.statistics.sections.map((section) =>
        buildSection(dataset, section, deps.renderer),
      ),
      genderCounts: {
        male: countEqual(dataset, InscriptionField.GENDER, "Male"),
        female: countEqual(dataset, InscriptionField.GENDER, "Female"),
      },
      years: yearSummary(dataset, deps.profile.overview.yearField),
    });
  });

  return app;
}
