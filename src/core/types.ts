// ---------------------------------------------------------------------------
// Core types for the Inscriptions Dashboard service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Cells, records, datasets ────────────────────────────────────────────────

/** A single cell: text, a number, or missing. */
export type CellValue = string | number | null;

/** One inscription row, keyed by column name. */
export type InscriptionRecord = Readonly<Record<string, CellValue>>;

/**
 * An ordered, immutable table of records sharing one column list.
 * Filtered views are Datasets too.
 */
export interface Dataset {
  readonly columns: readonly string[];
  readonly rows: readonly InscriptionRecord[];
}

export type ColumnKind = "number" | "text";

// ── Sentinels ───────────────────────────────────────────────────────────────

/** Reported in place of a metric whose column is absent. */
export const NOT_AVAILABLE = "not available";
export type NotAvailable = typeof NOT_AVAILABLE;

/** Select-box value meaning "do not filter on this field". */
export const ALL = "All";

/** Columns the dashboard knows how to present. */
export const InscriptionField = {
  PERSON_ID: "person_id",
  NAME: "name",
  GENDER: "gender",
  AGE_CATEGORY: "age_category",
  YEAR: "year",
  CASE: "case",
  INSCRIPTION_TYPE: "inscription_type",
} as const;
export type InscriptionField = (typeof InscriptionField)[keyof typeof InscriptionField];

// ── Query engine results ────────────────────────────────────────────────────

export interface YearRange {
  min: number;
  max: number;
}

export interface SummaryMetrics {
  totalRecords: number;
  uniquePeople: number | NotAvailable;
  yearRange: YearRange | NotAvailable;
  mostCommonGender: string | NotAvailable;
}

export interface CategoryCount {
  value: string | number;
  count: number;
  /** Share of the view's total row count, rounded to 2 decimals. */
  percentage: number;
}

export interface YearCount {
  year: number;
  count: number;
}

export interface YearSummary {
  earliest: number;
  latest: number;
  span: number;
}

/** Field name → exact value. */
export type FieldFilters = Readonly<Record<string, CellValue>>;

// ── Session / loading ───────────────────────────────────────────────────────

export const DatasetSourceKind = {
  FILE: "file",
  UPLOAD: "upload",
  SAMPLE: "sample",
  EMPTY: "empty",
} as const;
export type DatasetSourceKind = (typeof DatasetSourceKind)[keyof typeof DatasetSourceKind];

export interface DatasetSource {
  kind: DatasetSourceKind;
  label: string;
}

export interface Notice {
  level: "info" | "success" | "warning" | "error";
  message: string;
}

export interface LoadedDataset {
  dataset: Dataset;
  source: DatasetSource;
  loadedAt: string;
  notice: Notice;
}

// ── Charts ──────────────────────────────────────────────────────────────────

export type ChartStyle = "bar" | "plot";

export interface BarChartSpec {
  kind: "bar";
  title: string;
  categories: string[];
  values: number[];
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface HistogramSpec {
  kind: "histogram";
  title: string;
  bins: HistogramBin[];
}

export interface PieSlice {
  label: string;
  value: number;
  percentage: number;
}

export interface PieChartSpec {
  kind: "pie";
  title: string;
  slices: PieSlice[];
}

export type ChartSpec = BarChartSpec | HistogramSpec | PieChartSpec;

// ── Dashboard profile ───────────────────────────────────────────────────────

export type PageId = "overview" | "search" | "statistics" | "about";

export interface StatisticsSection {
  field: string;
  label: string;
  chart: "bar" | "pie";
}

export interface DashboardProfile {
  title: string;
  footer: string;
  chartStyle: ChartStyle;
  pages: PageId[];
  overview: {
    recentCount: number;
    yearField: string;
    histogramBins: number;
  };
  search: {
    selectFields: string[];
    exportFileName: string;
    pageSize: number;
  };
  statistics: {
    sections: StatisticsSection[];
  };
  about: {
    text: string;
  };
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "staging" | "production";
  port: number;
  logLevel: string;
  profile: string;
  dataset: DatasetConfig;
  cache: CacheConfig;
}

export interface DatasetConfig {
  path: string;
  fallback: "sample" | "empty";
  uploadMaxBytes: number;
}

export interface CacheConfig {
  enabled: boolean;
  maxMemoryEntries: number;
  datasetTtlSeconds: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}
