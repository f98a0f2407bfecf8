// ---------------------------------------------------------------------------
// Dataset loading from the configured CSV file or an uploaded body.
// ---------------------------------------------------------------------------

import { readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import type pino from "pino";

import type { Dataset, DatasetConfig, LoadedDataset, Notice } from "../core/types.js";
import { DatasetSourceKind } from "../core/types.js";
import { DatasetLoadError, UploadTooLargeError } from "../core/errors.js";
import { DatasetCache, fileSourceKey } from "../cache/dataset-cache.js";
import { parseCsv } from "../domain/dataset/csv.js";
import { emptyDataset } from "../domain/dataset/dataset.js";
import { sampleDataset } from "../domain/dataset/sample-data.js";

/**
 * Produces {@link LoadedDataset}s for the session.
 *
 * File loads never throw: a missing or unparsable file falls back to the
 * sample dataset or to an empty one, per `config.fallback`, with a notice
 * saying so. Upload failures do throw, since the caller keeps its current
 * dataset and reports the error to the user.
 */
export class DatasetLoader {
  private readonly config: DatasetConfig;
  private readonly cache: DatasetCache;
  private readonly logger: pino.Logger;

  constructor(config: DatasetConfig, cache: DatasetCache, logger: pino.Logger) {
    this.config = config;
    this.cache = cache;
    this.logger = logger;
  }

  /** Absolute path of the configured dataset file. */
  get defaultPath(): string {
    return path.resolve(this.config.path);
  }

  async loadFromFile(filePath: string = this.config.path): Promise<LoadedDataset> {
    const absolutePath = path.resolve(filePath);

    try {
      const dataset = await this.readDatasetFile(absolutePath);
      this.logger.info(
        { path: absolutePath, rows: dataset.rows.length, columns: dataset.columns.length },
        "dataset file loaded",
      );
      return loaded(dataset, DatasetSourceKind.FILE, path.basename(absolutePath), {
        level: "success",
        message: "Real data loaded!",
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(
        { path: absolutePath, fallback: this.config.fallback, err: reason },
        "dataset file could not be loaded; using fallback",
      );
      return this.fallback(reason);
    }
  }

  /** Forget any cached parse of the configured file, then load it again. */
  async reload(): Promise<LoadedDataset> {
    this.cache.invalidateFile(this.defaultPath);
    return this.loadFromFile();
  }

  /**
   * Parse an uploaded CSV body. Every cached dataset is discarded first:
   * an upload replaces the session's data wholesale.
   *
   * @throws {UploadTooLargeError} when the body exceeds `uploadMaxBytes`.
   * @throws {DatasetLoadError} when the body is not parsable CSV.
   */
  loadFromUpload(text: string, name: string): LoadedDataset {
    const sizeBytes = Buffer.byteLength(text, "utf-8");
    if (sizeBytes > this.config.uploadMaxBytes) {
      throw new UploadTooLargeError(sizeBytes, this.config.uploadMaxBytes);
    }

    this.cache.clear();
    const dataset = parseCsv(text, name);

    this.logger.info(
      { name, sizeBytes, rows: dataset.rows.length, columns: dataset.columns.length },
      "dataset uploaded",
    );
    return loaded(dataset, DatasetSourceKind.UPLOAD, name, {
      level: "success",
      message: "File uploaded successfully!",
    });
  }

  private async readDatasetFile(absolutePath: string): Promise<Dataset> {
    let key: string;
    try {
      const stats = await stat(absolutePath);
      key = fileSourceKey(absolutePath, stats.mtimeMs, stats.size);
    } catch (err) {
      throw new DatasetLoadError(`Cannot read ${absolutePath}`, absolutePath, { cause: err });
    }

    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const text = await readFile(absolutePath, "utf-8");
    const dataset = parseCsv(text, absolutePath);
    this.cache.set(key, dataset);
    return dataset;
  }

  private fallback(reason: string): LoadedDataset {
    if (this.config.fallback === "sample") {
      return loaded(sampleDataset(), DatasetSourceKind.SAMPLE, "sample data", {
        level: "warning",
        message: "Using sample data. Upload your CSV to see real data.",
      });
    }

    return loaded(emptyDataset(), DatasetSourceKind.EMPTY, "no data", {
      level: "error",
      message: `No data loaded (${reason}). Upload a CSV file to get started.`,
    });
  }
}

function loaded(
  dataset: Dataset,
  kind: DatasetSourceKind,
  label: string,
  notice: Notice,
): LoadedDataset {
  return {
    dataset,
    source: { kind, label },
    loadedAt: new Date().toISOString(),
    notice,
  };
}
