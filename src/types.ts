/**
 * Module: Public Types & Engine Version
 * Purpose: Define the record, table, identity and synchronization contracts shared by
 * every stage, plus the engine version banner exposed in run stats for diagnostics.
 */
export type CellValue = string | number | boolean | null | undefined | CellValue[] | { [key: string]: CellValue };

// Loosely typed row as it comes out of a workbook, CSV or JSON extractor
export type RawRow = Record<string, CellValue>;

// Normalized row: every value is a canonical string ("" when absent)
export type RecordRow = Record<string, string>;

export interface Table {
  columns: string[];
  rows: RecordRow[];
}

export type SourceTag = "OCR_QR" | "SCRAPE" | "EXCEL_OPERATOR";

export interface RecordOrigin {
  file: string;
  row?: number;
  page?: number;
}

export interface RawRecord {
  readonly source: SourceTag;
  readonly origin: Readonly<RecordOrigin>;
  readonly values: Readonly<RecordRow>;
}

export type IdentityKey =
  | { kind: "website"; value: string }    // normalized domain
  | { kind: "phone"; value: string }      // canonical digits
  | { kind: "email"; value: string }      // lower-cased address
  | { kind: "company_name"; value: string } // sha256 prefix of the normalized name
  | { kind: "random"; value: string };    // md5 prefix of a random seed, never reproducible

export interface IdentityFieldMap {
  website: string[];
  phones: string[];
  email: string[];
  companyName: string[];
}

export interface ColumnGroup {
  kind: "numbered" | "case" | "bilingual" | "alias";
  canonical: string;
  members: string[];
}

export type FusionMode = "ocr_qr" | "excel";
export type ScrapeFallback = "most_common" | "unmatched";

export interface FusionStats {
  engineVersion: string;
  mode?: FusionMode;
  sourceRows: number;
  enrichmentRows: number;
  enrichmentMatched: number;
  enrichmentFallback: number;
  columnsBefore: number;
  columnsAfter: number;
  groups: number;
  mergedGroups: number;
  repeatsBlanked: number;
  outputRows: number;
}

export interface SheetState {
  header: string[];
  rowCount: number;
}

export const COMPANY_ID = "CompanyID";
export const FILE_NAME = "file_name";
export const VALUE_SEPARATOR = " | ";

export const ENGINE_VERSION = "0.1.0";

export function emptyStats(): FusionStats {
  return {
    engineVersion: ENGINE_VERSION,
    sourceRows: 0,
    enrichmentRows: 0,
    enrichmentMatched: 0,
    enrichmentFallback: 0,
    columnsBefore: 0,
    columnsAfter: 0,
    groups: 0,
    mergedGroups: 0,
    repeatsBlanked: 0,
    outputRows: 0,
  };
}
