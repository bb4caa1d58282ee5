import { normalizeDomain } from "./identity.js";
import { normalizeRow, splitCellValues } from "./sanitize.js";
import type { RawRecord, RawRow, RecordRow, ScrapeFallback } from "./types.js";
import { FILE_NAME } from "./types.js";

/**
 * Module: Web Enrichment Linking
 * Purpose: Keep successful web-scrape records and attach each one to the uploaded file
 * whose OCR/QR rows mention the same domain.
 * The join is a heuristic: first domain match wins, and unmatched records either go to
 * the most common `file_name` or stay unattached, depending on the fallback policy.
 */
const STATUS_COLUMNS = ["status", "error"];
const LINK_COLUMN_RE = /website|url|qrlink/i;

const isRawRow = (v: unknown): v is RawRow => typeof v === "object" && v !== null && !Array.isArray(v);

/**
 * Rows whose `status` is SUCCESS (all rows when there is no status column), with the
 * bookkeeping columns removed.
 */
export function successfulEnrichmentRows(rows: RawRow[]): RecordRow[] {
  const out: RecordRow[] = [];
  for (const raw of rows) {
    const row = normalizeRow(raw);
    if ("status" in row && row.status.toUpperCase() !== "SUCCESS") continue;
    for (const c of STATUS_COLUMNS) delete row[c];
    if (Object.values(row).some(Boolean)) out.push(row);
  }
  return out;
}

export function scrapeRecords(data: unknown, file: string): RawRecord[] {
  if (!Array.isArray(data)) return [];
  const rows = successfulEnrichmentRows(data.filter(isRawRow));
  return rows.map((values, i) => ({ source: "SCRAPE", origin: { file, row: i + 1 }, values }));
}

/** Domain → first `file_name` whose link-like columns mention it. */
export function buildDomainIndex(rows: RecordRow[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const row of rows) {
    const fileName = row[FILE_NAME];
    if (!fileName) continue;
    for (const [col, cell] of Object.entries(row)) {
      if (!LINK_COLUMN_RE.test(col) || !cell) continue;
      for (const part of splitCellValues(cell)) {
        const domain = normalizeDomain(part);
        if (domain && !index.has(domain)) index.set(domain, fileName);
      }
    }
  }
  return index;
}

export function mostCommonFileName(rows: RecordRow[]): string | undefined {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const name = row[FILE_NAME];
    if (name) counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestCount = 0;
  for (const [name, count] of counts) {
    if (count > bestCount) {
      best = name;
      bestCount = count;
    }
  }
  return best;
}

const domainOf = (row: RecordRow): string => {
  for (const [col, cell] of Object.entries(row)) {
    if (!LINK_COLUMN_RE.test(col) || !cell) continue;
    for (const part of splitCellValues(cell)) {
      const domain = normalizeDomain(part);
      if (domain) return domain;
    }
  }
  return "";
};

export interface ScrapeLinkResult {
  rows: RecordRow[];
  matched: number;
  fallback: number;
  unmatched: number;
}

export function linkScrapeToFiles(
  scraped: RecordRow[],
  ocrRows: RecordRow[],
  policy: ScrapeFallback = "most_common"
): ScrapeLinkResult {
  const index = buildDomainIndex(ocrRows);
  const fallbackName = policy === "most_common" ? mostCommonFileName(ocrRows) : undefined;
  const result: ScrapeLinkResult = { rows: [], matched: 0, fallback: 0, unmatched: 0 };

  for (const row of scraped) {
    const hit = index.get(domainOf(row));
    if (hit) {
      result.matched++;
      result.rows.push({ ...row, [FILE_NAME]: hit });
    } else if (fallbackName) {
      result.fallback++;
      result.rows.push({ ...row, [FILE_NAME]: fallbackName });
    } else {
      result.unmatched++;
      result.rows.push({ ...row });
    }
  }
  return result;
}
