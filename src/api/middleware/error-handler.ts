// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type pino from "pino";
import { HTTPException } from "hono/http-exception";
import {
  DatasetLoadError,
  PageDisabledError,
  QueryValidationError,
  UploadTooLargeError,
} from "../../core/errors.js";

/**
 * Builds a Hono `onError` handler that inspects the thrown error and returns an
 * appropriate HTTP status code with a `{ error, type }` JSON body.
 *
 * Validation, load and page errors describe the caller's own input and are
 * always returned verbatim. Unexpected errors keep their message out of
 * production responses.
 *
 * Mapping:
 * - `QueryValidationError` -> 400 Bad Request
 * - `PageDisabledError`    -> 404 Not Found
 * - `UploadTooLargeError`  -> 413 Payload Too Large
 * - `DatasetLoadError`     -> 422 Unprocessable Entity
 * - `HTTPException`        -> its own response
 * - Everything else        -> 500 Internal Server Error
 */
export function createErrorHandler(
  logger: pino.Logger,
  isProduction: boolean,
): (err: Error, c: Context) => Response {
  return (err: Error, c: Context): Response => {
    if (err instanceof QueryValidationError) {
      return c.json({ error: err.message, type: "validation_error" }, 400);
    }

    if (err instanceof PageDisabledError) {
      return c.json({ error: err.message, type: "not_found" }, 404);
    }

    if (err instanceof UploadTooLargeError) {
      return c.json({ error: err.message, type: "upload_too_large" }, 413);
    }

    if (err instanceof DatasetLoadError) {
      return c.json({ error: err.message, type: "dataset_load_error" }, 422);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error({ err, path: c.req.path }, "unhandled error");

    const message = isProduction ? "Internal server error" : err.message;
    return c.json({ error: message, type: "internal_error" }, 500);
  };
}
