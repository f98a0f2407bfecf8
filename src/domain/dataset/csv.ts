// ---------------------------------------------------------------------------
// CSV codec: text <-> Dataset, with per-column type inference.
// ---------------------------------------------------------------------------

import Papa from "papaparse";
import type { ParseError } from "papaparse";
import type { CellValue, Dataset, InscriptionRecord } from "../../core/types.js";
import { CsvParseError } from "../../core/errors.js";
import { cellText, cellValue, createDataset } from "./dataset.js";

/** Cell spellings read as a missing value. */
const MISSING_MARKERS: ReadonlySet<string> = new Set([
  "",
  "NA",
  "N/A",
  "n/a",
  "NaN",
  "nan",
  "null",
  "NULL",
  "None",
  "#N/A",
  "<NA>",
]);

const NUMERIC_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const INTEGER_RE = /^[+-]?\d+$/;

const BYTE_ORDER_MARK = "\uFEFF";

// ── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Parse comma-separated text into a Dataset.
 *
 * The first non-blank record is the header. Blank header cells are named
 * `Unnamed: <index>` and repeated names get the first free `.1`, `.2`, ...
 * suffix. Short rows are padded with missing cells; long rows, unbalanced
 * quotes, and a text without a header throw {@link CsvParseError}.
 *
 * A column becomes numeric when every non-missing cell is numeric text and
 * no integer in it exceeds the safe integer range.
 *
 * @param source - Label used in error messages (file path or upload name).
 */
export function parseCsv(text: string, source = "csv"): Dataset {
  const input = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;

  const [header, ...records] = readRecords(input, source);
  if (!header) {
    throw new CsvParseError("No columns to parse from input", source);
  }

  const columns = normalizeHeader(header);

  records.forEach((record, index) => {
    if (record.length > columns.length) {
      throw new CsvParseError(
        `Expected ${columns.length} fields, saw ${record.length}`,
        source,
        index + 2,
      );
    }
  });

  const typed = columns.map((_, j) => typeColumn(records.map((record) => record[j])));

  const rows: InscriptionRecord[] = records.map((_, i) =>
    Object.fromEntries(columns.map((column, j) => [column, typed[j]?.[i] ?? null])),
  );

  return createDataset(columns, rows);
}

/**
 * Tokenize `input` into records, dropping only records whose source line is
 * blank. A quoted `""` line is a record holding one empty field.
 */
function readRecords(input: string, source: string): string[][] {
  const records: string[][] = [];
  const errors: Array<{ error: ParseError; row: number }> = [];
  let lineStart = 0;

  Papa.parse<string[]>(input, {
    delimiter: ",",
    skipEmptyLines: false,
    step: (result) => {
      const line = input.slice(lineStart, result.meta.cursor);
      lineStart = result.meta.cursor;

      for (const error of result.errors) {
        errors.push({ error, row: records.length + 1 });
      }

      const record = result.data;
      if (record.length === 1 && record[0] === "" && line.trim() === "") {
        return;
      }
      records.push(record);
    },
  });

  const first = errors[0];
  if (first) {
    throw new CsvParseError(`Malformed CSV: ${first.error.message}`, source, first.row);
  }

  return records;
}

/** Repeated names take the first `.N` suffix no other header uses. */
function normalizeHeader(header: readonly string[]): string[] {
  const bases = header.map((raw, index) => (raw === "" ? `Unnamed: ${index}` : raw));
  const reserved = new Set(bases);
  const taken = new Set<string>();

  return bases.map((base) => {
    let name = base;
    let suffix = 1;
    while (taken.has(name) || (name !== base && reserved.has(name))) {
      name = `${base}.${suffix++}`;
    }
    taken.add(name);
    return name;
  });
}

function isNumericText(cell: string): boolean {
  const text = cell.trim();
  if (!NUMERIC_RE.test(text)) {
    return false;
  }
  return !INTEGER_RE.test(text) || Number.isSafeInteger(Number(text));
}

function typeColumn(raw: ReadonlyArray<string | undefined>): CellValue[] {
  const present = raw.filter(
    (cell): cell is string => cell !== undefined && !MISSING_MARKERS.has(cell),
  );
  const numeric = present.length > 0 && present.every(isNumericText);

  return raw.map((cell) => {
    if (cell === undefined || MISSING_MARKERS.has(cell)) {
      return null;
    }
    return numeric ? Number(cell.trim()) : cell;
  });
}

// ── Serialization ───────────────────────────────────────────────────────────

/**
 * Serialize a dataset (or view) to CSV: header row first, columns in
 * dataset order, no index column, `\n` line endings and a trailing newline.
 * Missing cells become empty fields.
 */
export function toCsv(dataset: Dataset): string {
  if (dataset.columns.length === 0) {
    return "";
  }

  const records: string[][] = [
    [...dataset.columns],
    ...dataset.rows.map((row) =>
      dataset.columns.map((column) => cellText(cellValue(row, column))),
    ),
  ];

  const csv = Papa.unparse(records, {
    newline: "\n",
    // A lone empty field would otherwise read back as a blank line.
    quotes: dataset.columns.length === 1 ? (value: unknown) => value === "" : false,
  });

  return `${csv}\n`;
}
