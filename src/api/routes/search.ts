// ---------------------------------------------------------------------------
// Search page routes: filtered results and CSV export.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { DashboardProfile, Dataset, Notice } from "../../core/types.js";
import { ALL } from "../../core/types.js";
import type { DatasetSession } from "../../session/dataset-session.js";
import {
  applyFilters,
  distinctValuesSorted,
} from "../../domain/query/query-engine.js";
import { cellText, hasColumn } from "../../domain/dataset/dataset.js";
import { toCsv } from "../../domain/dataset/csv.js";
import { requirePage } from "../page-guard.js";
import { parseSearchRequest, typedFilters } from "../search-params.js";

/** Dependencies required by search routes. */
export interface SearchRouteDeps {
  session: DatasetSession;
  profile: DashboardProfile;
  logger: pino.Logger;
}

/**
 * Select-box options for each configured field the dataset actually has:
 * the `"All"` sentinel followed by the field's sorted distinct values.
 */
function selectOptions(dataset: Dataset, fields: readonly string[]): Record<string, string[]> {
  const options: Record<string, string[]> = {};
  for (const field of fields) {
    if (!hasColumn(dataset, field)) continue;
    options[field] = [ALL, ...distinctValuesSorted(dataset, field).map(cellText)];
  }
  return options;
}

function resultNotice(total: number): Notice {
  return total === 0
    ? { level: "warning", message: "No results found. Try different filters." }
    : { level: "info", message: `Found ${total} result${total === 1 ? "" : "s"}` };
}

/**
 * Mounts search endpoints:
 *
 * - `GET /api/search?q=&f.<field>=&limit=&offset=` -- One page of the
 *   filtered view plus select options.
 * - `GET /api/search/export?q=&f.<field>=`         -- The whole filtered
 *   view as a CSV download.
 */
export function searchRoutes(deps: SearchRouteDeps): Hono {
  const app = new Hono();
  const { selectFields, exportFileName, pageSize } = deps.profile.search;

  app.use("*", requirePage(deps.profile, "search"));

  // ── GET /api/search ──────────────────────────────────────────────────

  app.get("/", (c) => {
    const request = parseSearchRequest(c.req.query(), pageSize);
    const dataset = deps.session.dataset;
    const view = applyFilters(dataset, request.query, typedFilters(dataset, request.filters));
    const total = view.rows.length;

    return c.json({
      query: request.query,
      filters: request.filters,
      options: selectOptions(dataset, selectFields),
      total,
      offset: request.offset,
      limit: request.limit,
      columns: view.columns,
      rows: view.rows.slice(request.offset, request.offset + request.limit),
      notice: resultNotice(total),
    });
  });

  // ── GET /api/search/export ───────────────────────────────────────────

  app.get("/export", (c) => {
    const request = parseSearchRequest(c.req.query(), pageSize);
    const dataset = deps.session.dataset;
    const view = applyFilters(dataset, request.query, typedFilters(dataset, request.filters));

    deps.logger.info(
      { query: request.query, filters: request.filters, rows: view.rows.length },
      "filtered view exported",
    );

    return c.body(toCsv(view), 200, {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": `attachment; filename="${exportFileName}"`,
    });
  });

  return app;
}
