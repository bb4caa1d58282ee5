/**
 * Module: Ledger Core Entry Point
 * Purpose: Public API for fusing capture-session inputs (OCR/QR JSON, web enrichment,
 * operator workbooks) into one company ledger table and appending it to a shared sheet.
 * Notes:
 * - `runFusion` is the batch entry; `synchronizeSheet` takes any `SheetStore`.
 * - The building blocks (normalizer, identity keys, column reconciliation, merge) are
 *   exported for callers that run their own ingestion.
 */
export * from "./types.js";
export * from "./sanitize.js";
export * from "./identity.js";
export * from "./columns.js";
export * from "./merge.js";
export * from "./errors.js";
export * from "./events.js";
export { flattenOcrQr, flattenPage, FIELD_MAPPING } from "./ocrQr.js";
export { linkScrapeToFiles, scrapeRecords, successfulEnrichmentRows, buildDomainIndex, mostCommonFileName } from "./scrape.js";
export type { ScrapeLinkResult } from "./scrape.js";
export { readTableFile, readWorkbookBytes, tableToWorkbookBytes, writeWorkbook } from "./xlsx.js";
export { parseCsvToSheet, type ParsedSheet } from "./csv.js";
export { operatorRecords, runFusion, selectMode, writeFusedWorkbook } from "./pipeline.js";
export type { FusionOptions, FusionPaths, FusionResult } from "./pipeline.js";
export { loadConfig, findEnrichedWorkbook, runTimestamp, type FusionConfig } from "./config.js";
export { createLogger, configureLogger, getLogger } from "./logger.js";
export { GoogleSheetStore, type GoogleSheetStoreOptions, type SheetStore } from "./sheetStore.js";
export { columnLetter, diffColumns, readSheetState, synchronizeSheet, DEFAULT_CELL_LIMIT } from "./sheetSync.js";
export type { SyncFailure, SyncOptions, SyncReport, SyncResult, SyncStage } from "./sheetSync.js";
