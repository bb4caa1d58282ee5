import path from "node:path";
import { DEFAULT_ALIAS_GROUPS, reconcileColumns, type AliasGroup } from "./columns.js";
import { findEnrichedWorkbook } from "./config.js";
import { FusionError } from "./errors.js";
import { noopSink, type EventSink } from "./events.js";
import type { IdentityOptions } from "./identity.js";
import type { ParsedSheet } from "./csv.js";
import { fileExists, readJsonSource, type JsonSource } from "./jsonSource.js";
import { assignCompanyId, findIdColumn, mergeRecords } from "./merge.js";
import { flattenOcrQr } from "./ocrQr.js";
import { collectColumns, mergeCellValues, normalizeRow, rectangularize } from "./sanitize.js";
import { linkScrapeToFiles, scrapeRecords, successfulEnrichmentRows } from "./scrape.js";
import type { ColumnGroup, FusionMode, FusionStats, RawRecord, RecordRow, ScrapeFallback, Table } from "./types.js";
import { COMPANY_ID, FILE_NAME, emptyStats } from "./types.js";
import { readTableFile, writeWorkbook } from "./xlsx.js";

/**
 * Module: Source Fusion Pipeline
 * Purpose: Turn the raw inputs of one capture session into one fused table.
 * Steps:
 * - select the mode (OCR/QR JSON when present, else an operator workbook, else enrichment alone).
 * - ingest: OCR/QR pages plus linked web enrichment, or the normalized workbook rows.
 *   Without OCR/QR pages the enrichment rows stand alone, each its own entity.
 * - reconcile column variants, then merge rows per entity.
 * Stats, warnings and events are threaded through explicitly; nothing is global.
 */
export interface FusionPaths {
  ocrQrJson: string;
  scrapeJson?: string;
  webAnalysisXlsx?: string;
  inputExcel?: string;
  // searched for `output_enriched_*.xlsx` when Excel mode has no explicit workbook
  sessionDir?: string;
}

export interface FusionOptions {
  mode?: "auto" | FusionMode;
  mergeRows?: boolean;
  scrapeFallback?: ScrapeFallback;
  identity?: IdentityOptions;
  aliases?: AliasGroup[];
  repeatThreshold?: number;
  sink?: EventSink;
}

export interface FusionResult {
  mode: FusionMode;
  table: Table;
  stats: FusionStats;
  warnings: FusionError[];
  groups: ColumnGroup[];
}

interface RunContext {
  options: FusionOptions;
  stats: FusionStats;
  warnings: FusionError[];
  sink: EventSink;
}

export type ModeSelection = { mode: "ocr_qr" } | { mode: "excel"; file: string };

async function excelCandidate(paths: FusionPaths): Promise<string | undefined> {
  if (paths.inputExcel) return paths.inputExcel;
  return paths.sessionDir ? findEnrichedWorkbook(paths.sessionDir) : undefined;
}

export async function selectMode(paths: FusionPaths, requested: "auto" | FusionMode = "auto"): Promise<ModeSelection> {
  if (requested === "ocr_qr") return { mode: "ocr_qr" };
  const workbook = await excelCandidate(paths);
  if (requested === "excel") {
    if (!workbook) throw new FusionError("MissingSourceFile", "No operator workbook configured or found");
    return { mode: "excel", file: workbook };
  }
  if (await fileExists(paths.ocrQrJson)) return { mode: "ocr_qr" };
  if (workbook && (await fileExists(workbook))) return { mode: "excel", file: workbook };
  if (await enrichmentAvailable(paths)) return { mode: "ocr_qr" };
  throw new FusionError(
    "MissingSourceFile",
    `Neither ${path.basename(paths.ocrQrJson)} nor an operator workbook or enrichment source is available`,
    paths.ocrQrJson
  );
}

async function enrichmentAvailable(paths: FusionPaths): Promise<boolean> {
  for (const file of [paths.scrapeJson, paths.webAnalysisXlsx]) {
    if (file && (await fileExists(file))) return true;
  }
  return false;
}

function partialSource(
  ctx: RunContext,
  source: string,
  file: string,
  kind: "missing" | "empty",
  detail?: string
): void {
  ctx.sink({ type: kind === "missing" ? "source.missing" : "source.empty", source, path: file, fatal: false });
  const suffix = detail ? ` (${detail})` : "";
  ctx.warnings.push(
    new FusionError("PartialSourceUnavailable", `Source ${source} is ${kind}, continuing without it: ${file}${suffix}`, file)
  );
}

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

async function loadEnrichment(paths: FusionPaths, ctx: RunContext): Promise<RecordRow[]> {
  if (paths.scrapeJson) {
    const source = await readJsonSource(paths.scrapeJson);
    if (source.status === "ok") {
      const rows = scrapeRecords(source.data, source.path).map((r) => ({ ...r.values }));
      if (rows.length) {
        ctx.sink({ type: "source.loaded", source: "scrape", path: source.path, rows: rows.length });
        return rows;
      }
    }
    const detail = source.status === "invalid" ? source.message : undefined;
    partialSource(ctx, "scrape", paths.scrapeJson, source.status === "missing" ? "missing" : "empty", detail);
  }

  const workbook = paths.webAnalysisXlsx;
  if (workbook && (await fileExists(workbook))) {
    let rows: RecordRow[] = [];
    let detail: string | undefined;
    try {
      rows = successfulEnrichmentRows((await readTableFile(workbook)).rows);
    } catch (err) {
      detail = errorMessage(err);
    }
    if (rows.length) {
      ctx.sink({ type: "source.loaded", source: "web_analysis", path: workbook, rows: rows.length });
      return rows;
    }
    partialSource(ctx, "web_analysis", workbook, "empty", detail);
  }
  return [];
}

// One CompanyID per file: the identity of the file's rows folded together
function assignFileCompanyIds(rows: RecordRow[], identity?: IdentityOptions): void {
  const byFile = new Map<string, RecordRow[]>();
  for (const row of rows) {
    const name = row[FILE_NAME];
    if (!name) {
      row[COMPANY_ID] = assignCompanyId(row, COMPANY_ID, identity);
      continue;
    }
    const list = byFile.get(name) ?? [];
    list.push(row);
    byFile.set(name, list);
  }
  for (const members of byFile.values()) {
    const folded: RecordRow = {};
    for (const c of collectColumns(members)) folded[c] = mergeCellValues(members.map((m) => m[c] ?? ""));
    const id = assignCompanyId(folded, COMPANY_ID, identity);
    for (const m of members) m[COMPANY_ID] = id;
  }
}

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

// Rows without a file_name sort last; Array#sort is stable
function compareFileThenId(a: RecordRow, b: RecordRow): number {
  const fa = a[FILE_NAME] ?? "";
  const fb = b[FILE_NAME] ?? "";
  if (!fa !== !fb) return fa ? -1 : 1;
  return compareText(fa, fb) || compareText(a[COMPANY_ID] ?? "", b[COMPANY_ID] ?? "");
}

// Enrichment rows without OCR/QR pages: nothing to link them to, so no file_name
async function ingestEnrichmentOnly(paths: FusionPaths, source: JsonSource, ctx: RunContext): Promise<Table> {
  const kind = source.status === "missing" ? "missing" : "empty";
  const detail = source.status === "invalid" ? source.message : undefined;
  const rows = await loadEnrichment(paths, ctx);
  if (!rows.length) {
    ctx.sink({ type: kind === "missing" ? "source.missing" : "source.empty", source: "ocr_qr", path: source.path, fatal: true });
    if (kind === "missing") {
      throw new FusionError("MissingSourceFile", `OCR/QR input not found: ${source.path}`, source.path);
    }
    const suffix = detail ? ` (${detail})` : "";
    throw new FusionError("EmptySourceDataset", `OCR/QR input has no usable records: ${source.path}${suffix}`, source.path);
  }
  partialSource(ctx, "ocr_qr", source.path, kind, detail);
  ctx.stats.enrichmentRows = rows.length;
  ctx.sink({ type: "scrape.matched", matched: 0, fallback: 0, unmatched: rows.length });

  assignFileCompanyIds(rows, ctx.options.identity);
  rows.sort(compareFileThenId);
  return rectangularize({ columns: collectColumns(rows, [COMPANY_ID, FILE_NAME]), rows });
}

async function ingestOcrQr(paths: FusionPaths, ctx: RunContext): Promise<Table> {
  const source = await readJsonSource(paths.ocrQrJson);
  const records = source.status === "ok" ? flattenOcrQr(source.data) : [];
  if (!records.length) return ingestEnrichmentOnly(paths, source, ctx);
  ctx.sink({ type: "source.loaded", source: "ocr_qr", path: source.path, rows: records.length });

  const ocrRows = records.map((r): RecordRow => ({ ...r.values }));
  ctx.stats.sourceRows = ocrRows.length;

  const enrichment = await loadEnrichment(paths, ctx);
  const rows = [...ocrRows];
  if (enrichment.length) {
    const linked = linkScrapeToFiles(enrichment, ocrRows, ctx.options.scrapeFallback);
    ctx.stats.enrichmentRows = enrichment.length;
    ctx.stats.enrichmentMatched = linked.matched;
    ctx.stats.enrichmentFallback = linked.fallback;
    ctx.sink({ type: "scrape.matched", matched: linked.matched, fallback: linked.fallback, unmatched: linked.unmatched });
    rows.push(...linked.rows);
  }

  assignFileCompanyIds(rows, ctx.options.identity);
  rows.sort(compareFileThenId);
  return rectangularize({ columns: collectColumns(rows, [COMPANY_ID, FILE_NAME]), rows });
}

/** Normalized operator rows, blank and exact duplicate rows dropped. */
export function operatorRecords(sheet: ParsedSheet, file: string): RawRecord[] {
  const seen = new Set<string>();
  const records: RawRecord[] = [];
  sheet.rows.forEach((raw, i) => {
    const values = normalizeRow(raw);
    const cells = sheet.columns.map((c) => values[c] ?? "");
    if (cells.every((v) => !v)) return;
    const fingerprint = JSON.stringify(cells);
    if (seen.has(fingerprint)) return;
    seen.add(fingerprint);
    records.push({ source: "EXCEL_OPERATOR", origin: { file, row: i + 1 }, values });
  });
  return records;
}

async function ingestExcel(file: string, ctx: RunContext): Promise<Table> {
  if (!(await fileExists(file))) {
    ctx.sink({ type: "source.missing", source: "excel", path: file, fatal: true });
    throw new FusionError("MissingSourceFile", `Operator workbook not found: ${file}`, file);
  }
  const sheet = await readTableFile(file);
  const rows = operatorRecords(sheet, file).map((r): RecordRow => ({ ...r.values }));
  if (!rows.length) {
    ctx.sink({ type: "source.empty", source: "excel", path: file, fatal: true });
    throw new FusionError("EmptySourceDataset", `Operator workbook has no usable rows: ${file}`, file);
  }
  ctx.sink({ type: "source.loaded", source: "excel", path: file, rows: rows.length });
  ctx.stats.sourceRows = rows.length;

  const idColumn = findIdColumn(sheet.columns);
  for (const row of rows) row[COMPANY_ID] = assignCompanyId(row, idColumn, ctx.options.identity);
  return rectangularize({ columns: collectColumns(rows, [COMPANY_ID, ...sheet.columns]), rows });
}

function companyIdFirst(table: Table): Table {
  return rectangularize({
    columns: [COMPANY_ID, ...table.columns.filter((c) => c !== COMPANY_ID)],
    rows: table.rows,
  });
}

export async function runFusion(paths: FusionPaths, options: FusionOptions = {}): Promise<FusionResult> {
  const ctx: RunContext = { options, stats: emptyStats(), warnings: [], sink: options.sink ?? noopSink };
  const selection = await selectMode(paths, options.mode);
  ctx.stats.mode = selection.mode;
  ctx.sink({ type: "mode.selected", mode: selection.mode });

  const ingested = selection.mode === "ocr_qr" ? await ingestOcrQr(paths, ctx) : await ingestExcel(selection.file, ctx);
  ctx.stats.columnsBefore = ingested.columns.length;

  const reconciled = reconcileColumns(ingested, { aliases: options.aliases ?? DEFAULT_ALIAS_GROUPS });
  ctx.sink({
    type: "columns.reconciled",
    before: ingested.columns.length,
    after: reconciled.table.columns.length,
    groups: reconciled.groups,
  });

  let table = reconciled.table;
  if (options.mergeRows !== false) {
    const merged = mergeRecords(table, {
      identity: options.identity,
      idColumn: COMPANY_ID,
      repeatThreshold: options.repeatThreshold,
    });
    ctx.stats.groups = merged.groups;
    ctx.stats.mergedGroups = merged.mergedGroups;
    ctx.stats.repeatsBlanked = merged.repeatsBlanked;
    ctx.sink({ type: "records.merged", rowsIn: table.rows.length, rowsOut: merged.table.rows.length, mergedGroups: merged.mergedGroups });
    if (merged.repeatsBlanked) ctx.sink({ type: "repeats.blanked", cells: merged.repeatsBlanked });
    table = merged.table;
  }

  table = companyIdFirst(table);
  ctx.stats.columnsAfter = table.columns.length;
  ctx.stats.outputRows = table.rows.length;

  return { mode: selection.mode, table, stats: ctx.stats, warnings: ctx.warnings, groups: reconciled.groups };
}

export async function writeFusedWorkbook(table: Table, file: string, sink: EventSink = noopSink): Promise<void> {
  await writeWorkbook(table, file);
  sink({ type: "workbook.written", path: file, rows: table.rows.length, columns: table.columns.length });
}
