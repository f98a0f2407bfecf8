// ---------------------------------------------------------------------------
// Dataset routes: inspect, upload and reload the session's data.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import { QueryValidationError, UploadTooLargeError } from "../../core/errors.js";
import type { DatasetLoader } from "../../session/dataset-loader.js";
import type { DatasetSession } from "../../session/dataset-session.js";

/** Dependencies required by dataset routes. */
export interface DatasetRouteDeps {
  session: DatasetSession;
  loader: DatasetLoader;
  uploadMaxBytes: number;
  logger: pino.Logger;
}

const UPLOAD_NAME_RE = /^[^\\/\u0000-\u001f]{1,200}$/;

/**
 * Mounts dataset endpoints:
 *
 * - `GET  /api/dataset`        -- Source, load time, notice, row/column info.
 * - `POST /api/dataset?name=`  -- Replace the dataset with the CSV body.
 * - `POST /api/dataset/reload` -- Re-read the configured CSV file.
 */
export function datasetRoutes(deps: DatasetRouteDeps): Hono {
  const app = new Hono();

  // GET /api/dataset
  app.get("/", (c) => c.json(deps.session.describe()));

  // POST /api/dataset
  app.post("/", async (c) => {
    const name = c.req.query("name") ?? "upload.csv";
    if (!UPLOAD_NAME_RE.test(name)) {
      throw new QueryValidationError("name", "must be a plain file name");
    }

    const declaredLength = Number(c.req.header("content-length") ?? "0");
    if (declaredLength > deps.uploadMaxBytes) {
      throw new UploadTooLargeError(declaredLength, deps.uploadMaxBytes);
    }

    const text = await c.req.text();
    const loaded = deps.loader.loadFromUpload(text, name);
    deps.session.replace(loaded);

    return c.json(deps.session.describe(), 201);
  });

  // POST /api/dataset/reload
  app.post("/reload", async (c) => {
    const loaded = await deps.loader.reload();
    deps.session.replace(loaded);
    deps.logger.info({ source: loaded.source.label }, "dataset reloaded");

    return c.json(deps.session.describe());
  });

  return app;
}
