import type { CellValue, RawRow, RecordRow, Table } from "./types.js";
import { VALUE_SEPARATOR } from "./types.js";

/**
 * Module: Cell Sanitizers
 * Purpose: Canonicalize single cell values coming from OCR, QR, scraping and operator
 * spreadsheets into plain strings, and fold several values into one pipe-joined cell.
 * Rules (in order):
 * - absent values and the `nan`/`None`/`NaT`/`null` sentinels become "".
 * - surrounding whitespace is trimmed.
 * - leading `=` signs are stripped, so formulas arrive as inert text.
 * - values starting with `#` (propagated spreadsheet errors) become "".
 * - Persian and Arabic-Indic digits become ASCII digits.
 * `normalizeCell` is total and idempotent.
 */
const NULL_SENTINELS = new Set(["nan", "none", "nat", "null"]);

const PERSIAN_ZERO = 0x06f0;
const ARABIC_INDIC_ZERO = 0x0660;
const NON_LATIN_DIGIT_RE = /[\u06F0-\u06F9\u0660-\u0669]/g;

const toText = (value: CellValue): string => {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  if (typeof value === "boolean") return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    return "";
  }
};

export const isNullSentinel = (s: string): boolean => NULL_SENTINELS.has(s.trim().toLowerCase());

export const toAsciiDigits = (s: string): string =>
  s.replace(NON_LATIN_DIGIT_RE, (d) => {
    const code = d.charCodeAt(0);
    const zero = code >= PERSIAN_ZERO ? PERSIAN_ZERO : ARABIC_INDIC_ZERO;
    return String(code - zero);
  });

export const hasPersianScript = (s: string): boolean => /[\u0600-\u06FF]/.test(s);

export function normalizeCell(value: CellValue): string {
  let s = toText(value).trim();
  if (!s) return "";
  s = s.replace(/^(?:=\s*)+/, "");
  if (!s || isNullSentinel(s)) return "";
  if (s.startsWith("#")) return "";
  return toAsciiDigits(s);
}

/**
 * Final pass over any value leaving the process (workbook export, remote append).
 * Values synthesized late in the pipeline may not have gone through `normalizeCell`.
 */
export const sanitizeOutgoingCell = (value: CellValue): string => normalizeCell(value);

export function normalizeRow(row: RawRow): RecordRow {
  const out: RecordRow = {};
  for (const key of Object.keys(row)) {
    const name = key.trim();
    if (!name) continue;
    const value = normalizeCell(row[key]);
    const earlier = out[name];
    out[name] = earlier === undefined ? value : mergeCellValues([earlier, value]);
  }
  return out;
}

/**
 * Distinct non-empty normalized values in first-seen order, joined with `" | "`.
 */
export function mergeCellValues(values: Iterable<CellValue>): string {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    const s = normalizeCell(v);
    if (!s || seen.has(s)) continue;
    seen.add(s);
    out.push(s);
  }
  return out.join(VALUE_SEPARATOR);
}

export const splitCellValues = (cell: string): string[] =>
  cell
    .split("|")
    .map((part) => part.trim())
    .filter(Boolean);

/** Column union in first-seen order, seed first. */
export function collectColumns(rows: Array<Record<string, unknown>>, seed: string[] = []): string[] {
  const seen = new Set<string>();
  const columns: string[] = [];
  const add = (key: string): void => {
    if (seen.has(key)) return;
    seen.add(key);
    columns.push(key);
  };
  seed.forEach(add);
  for (const row of rows) Object.keys(row).forEach(add);
  return columns;
}

/** Every row gets a value for every column; unknown keys are dropped. */
export function rectangularize(table: Table): Table {
  const rows = table.rows.map((row) => {
    const out: RecordRow = {};
    for (const c of table.columns) out[c] = row[c] ?? "";
    return out;
  });
  return { columns: [...table.columns], rows };
}
