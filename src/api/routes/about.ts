// ---------------------------------------------------------------------------
// About page route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { DashboardProfile } from "../../core/types.js";
import { InscriptionField } from "../../core/types.js";
import type { DatasetSession } from "../../session/dataset-session.js";
import { hasColumn } from "../../domain/dataset/dataset.js";
import { requirePage } from "../page-guard.js";

/** Dependencies required by the about route. */
export interface AboutRouteDeps {
  session: DatasetSession;
  profile: DashboardProfile;
}

/**
 * Mounts `GET /api/about`: the profile's description plus which of the
 * well-known inscription fields the loaded dataset provides.
 */
export function aboutRoutes(deps: AboutRouteDeps): Hono {
  const app = new Hono();

  app.use("*", requirePage(deps.profile, "about"));

  app.get("/", (c) => {
    const dataset = deps.session.dataset;

    return c.json({
      title: deps.profile.title,
      text: deps.profile.about.text,
      source: deps.session.loaded.source,
      columns: dataset.columns,
      fields: Object.values(InscriptionField).map((field) => ({
        field,
        available: hasColumn(dataset, field),
      })),
    });
  });

  return app;
}
