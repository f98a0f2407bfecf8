// ---------------------------------------------------------------------------
// Error hierarchy for the Inscriptions Dashboard service.
// ---------------------------------------------------------------------------

import type { PageId } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all dashboard domain errors.
 */
export class DashboardError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DashboardError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Loading errors ──────────────────────────────────────────────────────────

/**
 * A dataset source could not be read or parsed.
 */
export class DatasetLoadError extends DashboardError {
  public readonly source: string;

  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DatasetLoadError";
    this.source = source;
  }
}

/** The CSV text is malformed. `row` is the 1-based CSV record (header = 1) when known. */
export class CsvParseError extends DatasetLoadError {
  public readonly row: number | null;

  constructor(
    message: string,
    source: string,
    row: number | null = null,
    options?: ErrorOptions,
  ) {
    super(row === null ? message : `${message} (row ${row})`, source, options);
    this.name = "CsvParseError";
    this.row = row;
  }
}

/** An uploaded body exceeds the configured size limit. */
export class UploadTooLargeError extends DashboardError {
  public readonly sizeBytes: number;
  public readonly limitBytes: number;

  constructor(sizeBytes: number, limitBytes: number, options?: ErrorOptions) {
    super(`Upload of ${sizeBytes} bytes exceeds the ${limitBytes}-byte limit`, options);
    this.name = "UploadTooLargeError";
    this.sizeBytes = sizeBytes;
    this.limitBytes = limitBytes;
  }
}

// ── Request errors ──────────────────────────────────────────────────────────

/** A request parameter failed validation. */
export class QueryValidationError extends DashboardError {
  public readonly parameter: string;

  constructor(parameter: string, reason: string, options?: ErrorOptions) {
    super(`Invalid parameter "${parameter}": ${reason}`, options);
    this.name = "QueryValidationError";
    this.parameter = parameter;
  }
}

/** The active profile does not include the requested page. */
export class PageDisabledError extends DashboardError {
  public readonly page: PageId;

  constructor(page: PageId, options?: ErrorOptions) {
    super(`Page "${page}" is not enabled in this dashboard`, options);
    this.name = "PageDisabledError";
    this.page = page;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends DashboardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
