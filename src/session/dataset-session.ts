// ---------------------------------------------------------------------------
// Session context: the dataset every query of this process runs against.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { Dataset, DatasetSource, LoadedDataset, Notice } from "../core/types.js";

/** Public description of the session's dataset. */
export interface DatasetInfo {
  source: DatasetSource;
  loadedAt: string;
  notice: Notice;
  rowCount: number;
  columns: string[];
}

/**
 * Holds the current {@link LoadedDataset}. Route handlers receive the
 * session by reference and read `dataset` once per request; only the loader
 * paths (`replace`) ever swap it, and always wholesale.
 */
export class DatasetSession {
  private current: LoadedDataset;
  private readonly logger: pino.Logger;

  constructor(initial: LoadedDataset, logger: pino.Logger) {
    this.current = initial;
    this.logger = logger;
  }

  get dataset(): Dataset {
    return this.current.dataset;
  }

  get loaded(): LoadedDataset {
    return this.current;
  }

  replace(next: LoadedDataset): void {
    const previous = this.current.source;
    this.current = next;
    this.logger.info(
      {
        previous: previous.label,
        source: next.source.label,
        kind: next.source.kind,
        rows: next.dataset.rows.length,
      },
      "session dataset replaced",
    );
  }

  describe(): DatasetInfo {
    return {
      source: this.current.source,
      loadedAt: this.current.loadedAt,
      notice: this.current.notice,
      rowCount: this.current.dataset.rows.length,
      columns: [...this.current.dataset.columns],
    };
  }
}
