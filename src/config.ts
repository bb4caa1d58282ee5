import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { isMissingFile } from "./jsonSource.js";
import type { ScrapeFallback } from "./types.js";

/**
 * Module: Configuration
 * Purpose: Validate the environment into a typed config. File locations default to
 * well-known names inside the session directory.
 */
const bool = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === "string" ? ["1", "true", "yes", "on"].includes(v.trim().toLowerCase()) : v));

const schema = z.object({
  SESSION_DIR: z.string().min(1).optional(),
  INPUT_JSON: z.string().min(1).optional(),
  SCRAPE_JSON: z.string().min(1).optional(),
  WEB_ANALYSIS_XLSX: z.string().min(1).optional(),
  INPUT_EXCEL: z.string().min(1).optional(),
  OUTPUT_EXCEL: z.string().min(1).optional(),
  FUSION_MODE: z.enum(["auto", "ocr_qr", "excel"]).default("auto"),
  MERGE_ROWS: bool.default(true),
  SCRAPE_FALLBACK: z.enum(["most_common", "unmatched"]).default("most_common"),
  DEFAULT_COUNTRY_CODE: z.string().regex(/^\d{1,4}$/, "must be 1-4 digits").default("98"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: bool.default(false),
  GOOGLE_SHEET_ID: z.string().min(1).optional(),
  GOOGLE_SHEET_NAME: z.string().min(1).default("Sheet1"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().min(1).optional(),
  SHEET_CELL_LIMIT: z.coerce.number().int().positive().default(10_000_000),
});

export interface FusionConfig {
  sessionDir: string;
  paths: {
    ocrQrJson: string;
    scrapeJson: string;
    webAnalysisXlsx: string;
    inputExcel?: string;
    outputExcel: string;
  };
  mode: "auto" | "ocr_qr" | "excel";
  mergeRows: boolean;
  scrapeFallback: ScrapeFallback;
  defaultCountryCode: string;
  log: { level: string; pretty: boolean };
  sheet: {
    spreadsheetId?: string;
    sheetName: string;
    credentialsFile?: string;
    cellLimit: number;
  };
}

const pad = (n: number): string => String(n).padStart(2, "0");

export function runTimestamp(d: Date = new Date()): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

export function loadConfig(env: Record<string, string | undefined> = process.env, now: Date = new Date()): FusionConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const raw = parsed.data;
  const sessionDir = path.resolve(raw.SESSION_DIR ?? process.cwd());
  const inSession = (name: string) => path.join(sessionDir, name);

  return {
    sessionDir,
    paths: {
      ocrQrJson: raw.INPUT_JSON ?? inSession("mix_ocr_qr.json"),
      scrapeJson: raw.SCRAPE_JSON ?? inSession("gemini_scrap_output.json"),
      webAnalysisXlsx: raw.WEB_ANALYSIS_XLSX ?? inSession("web_analysis.xlsx"),
      inputExcel: raw.INPUT_EXCEL,
      outputExcel: raw.OUTPUT_EXCEL ?? inSession(`merged_final_${runTimestamp(now)}.xlsx`),
    },
    mode: raw.FUSION_MODE,
    mergeRows: raw.MERGE_ROWS,
    scrapeFallback: raw.SCRAPE_FALLBACK,
    defaultCountryCode: raw.DEFAULT_COUNTRY_CODE,
    log: { level: raw.LOG_LEVEL, pretty: raw.LOG_PRETTY },
    sheet: {
      spreadsheetId: raw.GOOGLE_SHEET_ID,
      sheetName: raw.GOOGLE_SHEET_NAME,
      credentialsFile: raw.GOOGLE_APPLICATION_CREDENTIALS,
      cellLimit: raw.SHEET_CELL_LIMIT,
    },
  };
}

/**
 * Newest `output_enriched_*.xlsx` in the session directory, when no explicit
 * Excel-mode workbook is configured.
 */
export async function findEnrichedWorkbook(sessionDir: string): Promise<string | undefined> {
  let names: string[];
  try {
    names = await readdir(sessionDir);
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
  const candidates = names.filter((n) => /^output_enriched_.*\.xlsx$/i.test(n));
  let newest: { file: string; mtime: number } | undefined;
  for (const name of candidates) {
    const file = path.join(sessionDir, name);
    const info = await stat(file);
    if (!newest || info.mtimeMs > newest.mtime) newest = { file, mtime: info.mtimeMs };
  }
  return newest?.file;
}
