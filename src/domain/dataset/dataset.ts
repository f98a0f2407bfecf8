// ---------------------------------------------------------------------------
// Dataset construction and cell helpers.
// ---------------------------------------------------------------------------

import type {
  CellValue,
  ColumnKind,
  Dataset,
  InscriptionRecord,
} from "../../core/types.js";

/**
 * Build a frozen Dataset. Rows are shared, never copied: a Dataset is
 * read-only once built, so views may point at the same record objects.
 */
export function createDataset(
  columns: readonly string[],
  rows: readonly InscriptionRecord[],
): Dataset {
  return Object.freeze({
    columns: Object.freeze([...columns]),
    rows: Object.freeze([...rows]),
  });
}

/** A dataset with no rows (and, unless given, no columns). */
export function emptyDataset(columns: readonly string[] = []): Dataset {
  return createDataset(columns, []);
}

/** A view over `dataset` holding `rows`, with the same column list. */
export function withRows(
  dataset: Dataset,
  rows: readonly InscriptionRecord[],
): Dataset {
  return Object.freeze({
    columns: dataset.columns,
    rows: Object.freeze([...rows]),
  });
}

export function hasColumn(dataset: Dataset, field: string): boolean {
  return dataset.columns.includes(field);
}

/** The cell for `field`, treating a key the row lacks as missing. */
export function cellValue(row: InscriptionRecord, field: string): CellValue {
  return Object.prototype.hasOwnProperty.call(row, field) ? row[field] ?? null : null;
}

/** Datasets never hold `NaN`: the CSV codec maps unparsable numbers to text. */
export function isMissing(value: CellValue): value is null {
  return value === null;
}

/**
 * Locale-independent text form of a cell: `120` becomes `"120"`, never
 * `"120.0"` or `"1,20"`. Missing cells become the empty string.
 */
export function cellText(value: CellValue): string {
  if (value === null) {
    return "";
  }
  return typeof value === "number" ? String(value) : value;
}

/**
 * Infer whether a column holds numbers: every non-missing cell must be a
 * number and at least one must be present.
 */
export function columnKind(dataset: Dataset, field: string): ColumnKind {
  let sawNumber = false;
  for (const row of dataset.rows) {
    const value = cellValue(row, field);
    if (isMissing(value)) continue;
    if (typeof value !== "number") return "text";
    sawNumber = true;
  }
  return sawNumber ? "number" : "text";
}
