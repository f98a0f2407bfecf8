// ---------------------------------------------------------------------------
// Parsed-dataset cache keyed by source identity.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { CacheConfig, Dataset } from "../core/types.js";
import { MemoryCache } from "./memory-cache.js";

/**
 * Identity of a file source: the same path with a different modification
 * time or size is a different key, so an edited file is never served stale.
 */
export function fileSourceKey(absolutePath: string, mtimeMs: number, size: number): string {
  return `file:${absolutePath}:${mtimeMs}:${size}`;
}

/**
 * Caches parsed datasets so repeated loads of an unchanged file skip the
 * CSV parse. Uploads and reloads invalidate entries explicitly.
 */
export class DatasetCache {
  private readonly cache: MemoryCache<Dataset>;
  private readonly ttlMs: number;
  private readonly enabled: boolean;
  private readonly logger: pino.Logger;

  constructor(config: CacheConfig, logger: pino.Logger) {
    this.cache = new MemoryCache<Dataset>(config.maxMemoryEntries);
    this.ttlMs = config.datasetTtlSeconds * 1000;
    this.enabled = config.enabled;
    this.logger = logger;
  }

  get(key: string): Dataset | null {
    if (!this.enabled) {
      return null;
    }

    const dataset = this.cache.get(key);
    this.logger.debug({ key }, dataset ? "cache hit" : "cache miss");
    return dataset;
  }

  set(key: string, dataset: Dataset): void {
    if (!this.enabled) {
      return;
    }

    this.cache.set(key, dataset, this.ttlMs);
    this.logger.debug({ key, rows: dataset.rows.length }, "cache set");
  }

  /** Drop every cached version of the file at `absolutePath`. */
  invalidateFile(absolutePath: string): void {
    const prefix = `file:${absolutePath}:`;
    const removed = this.cache.deleteWhere((key) => key.startsWith(prefix));
    this.logger.debug({ path: absolutePath, removed }, "cache invalidated");
  }

  clear(): void {
    this.cache.clear();
    this.logger.debug("cache cleared");
  }

  get size(): number {
    return this.cache.size;
  }
}
