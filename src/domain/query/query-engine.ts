// ---------------------------------------------------------------------------
// Dataset query engine: filtering, aggregation and summary metrics.
//
// Every function is pure. Inputs are never mutated; filters return new views
// whose rows are an order-preserving subset of the input. A field the dataset
// lacks degrades to an empty or "not available" result instead of throwing.
// ---------------------------------------------------------------------------

import type {
  CategoryCount,
  CellValue,
  Dataset,
  FieldFilters,
  InscriptionRecord,
  NotAvailable,
  SummaryMetrics,
  YearCount,
  YearRange,
  YearSummary,
} from "../../core/types.js";
import { ALL, InscriptionField, NOT_AVAILABLE } from "../../core/types.js";
import {
  cellText,
  cellValue,
  columnKind,
  hasColumn,
  isMissing,
  withRows,
} from "../dataset/dataset.js";

// ── Summary ─────────────────────────────────────────────────────────────────

/**
 * Headline metrics for the overview page.
 *
 * `mostCommonGender` breaks ties by the first value met in row order.
 */
export function summaryMetrics(dataset: Dataset): SummaryMetrics {
  return {
    totalRecords: dataset.rows.length,
    uniquePeople: distinctCount(dataset, InscriptionField.PERSON_ID),
    yearRange: numericRange(dataset, InscriptionField.YEAR),
    mostCommonGender: mostFrequent(dataset, InscriptionField.GENDER),
  };
}

function distinctCount(dataset: Dataset, field: string): number | NotAvailable {
  if (!hasColumn(dataset, field)) {
    return NOT_AVAILABLE;
  }
  const seen = new Set<string | number>();
  for (const row of dataset.rows) {
    const value = cellValue(row, field);
    if (!isMissing(value)) seen.add(value);
  }
  return seen.size;
}

function numericRange(dataset: Dataset, field: string): YearRange | NotAvailable {
  if (!hasColumn(dataset, field)) {
    return NOT_AVAILABLE;
  }
  let range: YearRange | null = null;
  for (const row of dataset.rows) {
    const value = cellValue(row, field);
    if (typeof value !== "number") continue;
    range = range === null
      ? { min: value, max: value }
      : { min: Math.min(range.min, value), max: Math.max(range.max, value) };
  }
  return range ?? NOT_AVAILABLE;
}

function mostFrequent(dataset: Dataset, field: string): string | NotAvailable {
  const top = categoricalAggregate(dataset, field)[0];
  return top === undefined ? NOT_AVAILABLE : cellText(top.value);
}

/**
 * Number of rows whose `field` equals `value`, or "not available" when the
 * dataset has no such column.
 */
export function countEqual(
  dataset: Dataset,
  field: string,
  value: CellValue,
): number | NotAvailable {
  if (!hasColumn(dataset, field)) {
    return NOT_AVAILABLE;
  }
  return filterByField(dataset, field, value).rows.length;
}

/** Earliest and latest year, and the span between them. */
export function yearSummary(
  dataset: Dataset,
  yearField: string = InscriptionField.YEAR,
): YearSummary | NotAvailable {
  const range = numericRange(dataset, yearField);
  if (range === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  return { earliest: range.min, latest: range.max, span: range.max - range.min };
}

// ── Filters ─────────────────────────────────────────────────────────────────

/**
 * Rows where any column, rendered as text, contains `query`
 * case-insensitively. Missing cells never match. An empty query returns the
 * input itself.
 */
export function filterByText(dataset: Dataset, query: string): Dataset {
  if (query === "") {
    return dataset;
  }
  const needle = query.toLowerCase();

  return withRows(
    dataset,
    dataset.rows.filter((row) =>
      dataset.columns.some((column) => {
        const value = cellValue(row, column);
        return !isMissing(value) && cellText(value).toLowerCase().includes(needle);
      }),
    ),
  );
}

/**
 * Rows whose `field` equals `value` exactly. An absent field or the `"All"`
 * sentinel returns the input itself.
 */
export function filterByField(dataset: Dataset, field: string, value: CellValue): Dataset {
  if (!hasColumn(dataset, field) || value === ALL) {
    return dataset;
  }

  return withRows(
    dataset,
    dataset.rows.filter((row) => {
      const cell = cellValue(row, field);
      return !isMissing(cell) && cell === value;
    }),
  );
}

/** Text search first, then every field filter; all conditions must hold. */
export function applyFilters(
  dataset: Dataset,
  textQuery: string,
  fieldFilters: FieldFilters,
): Dataset {
  return Object.entries(fieldFilters).reduce(
    (view, [field, value]) => filterByField(view, field, value),
    filterByText(dataset, textQuery),
  );
}

/**
 * Convert a filter value that arrived as text to the column's type, so that
 * `"120"` matches the number `120` in a numeric column.
 */
export function parseFieldValue(dataset: Dataset, field: string, raw: string): CellValue {
  if (raw === ALL || !hasColumn(dataset, field)) {
    return raw;
  }
  if (columnKind(dataset, field) === "number") {
    const parsed = Number(raw);
    if (raw.trim() !== "" && Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return raw;
}

// ── Distinct values and aggregates ──────────────────────────────────────────

/**
 * Distinct non-missing values of `field`, sorted by their text form.
 * Callers offering a select box prepend the `"All"` sentinel themselves.
 */
export function distinctValuesSorted(dataset: Dataset, field: string): Array<string | number> {
  if (!hasColumn(dataset, field)) {
    return [];
  }
  const values = new Set<string | number>();
  for (const row of dataset.rows) {
    const value = cellValue(row, field);
    if (!isMissing(value)) values.add(value);
  }
  return [...values].sort((a, b) => compareText(cellText(a), cellText(b)));
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Count and percentage per distinct non-missing value of `field`.
 *
 * Percentages are relative to the view's total row count (missing cells
 * included) and rounded to 2 decimals. Sorted by count descending; equal
 * counts keep first-seen order.
 */
export function categoricalAggregate(dataset: Dataset, field: string): CategoryCount[] {
  if (!hasColumn(dataset, field) || dataset.rows.length === 0) {
    return [];
  }

  const counts = new Map<string | number, number>();
  for (const row of dataset.rows) {
    const value = cellValue(row, field);
    if (isMissing(value)) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  const total = dataset.rows.length;
  return [...counts]
    .map(([value, count]) => ({ value, count, percentage: roundTo2((count / total) * 100) }))
    .sort((a, b) => b.count - a.count);
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Records per distinct numeric year, ascending by year. */
export function timeSeriesCounts(
  dataset: Dataset,
  yearField: string = InscriptionField.YEAR,
): YearCount[] {
  if (!hasColumn(dataset, yearField)) {
    return [];
  }

  const counts = new Map<number, number>();
  for (const row of dataset.rows) {
    const year = cellValue(row, yearField);
    if (typeof year !== "number") continue;
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }

  return [...counts]
    .map(([year, count]) => ({ year, count }))
    .sort((a, b) => a.year - b.year);
}

// ── Ordering ────────────────────────────────────────────────────────────────

/**
 * The latest `limit` records by year, missing years last; rows sharing a
 * year keep their order. Without a year column, the first `limit` rows.
 */
export function recentRecords(
  dataset: Dataset,
  limit: number,
  yearField: string = InscriptionField.YEAR,
): Dataset {
  if (!hasColumn(dataset, yearField)) {
    return withRows(dataset, dataset.rows.slice(0, limit));
  }

  const sorted = [...dataset.rows].sort((a, b) => compareYearDescending(a, b, yearField));
  return withRows(dataset, sorted.slice(0, limit));
}

function compareYearDescending(
  a: InscriptionRecord,
  b: InscriptionRecord,
  yearField: string,
): number {
  const ya = cellValue(a, yearField);
  const yb = cellValue(b, yearField);

  if (typeof ya === "number" && typeof yb === "number") {
    return yb - ya;
  }
  return Number(typeof ya !== "number") - Number(typeof yb !== "number");
}
