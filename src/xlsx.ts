import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import { gridToSheet, parseCsvToSheet, type ParsedSheet } from "./csv.js";
import { sanitizeOutgoingCell } from "./sanitize.js";
import type { Table } from "./types.js";

/**
 * Read an Excel workbook from bytes and return header-keyed rows of its main sheet.
 * - Chooses the main sheet (prefers `Sheet1`, otherwise the first sheet).
 * - Cells keep their raw values; numbers stay numbers until normalization.
 */
export function readWorkbookBytes(bytes: Uint8Array): ParsedSheet {
  const workbook = XLSX.read(bytes, { type: "array" });
  const mainSheetName = chooseMainSheet(workbook.SheetNames);
  const sheet = mainSheetName ? workbook.Sheets[mainSheetName] : undefined;
  if (!sheet) return { columns: [], rows: [] };

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
  return gridToSheet(grid);
}

function chooseMainSheet(sheetNames: string[]): string | undefined {
  const preferred = sheetNames.find((name) => name.toLowerCase() === "sheet1");
  return preferred ?? sheetNames[0];
}

/** `.csv` files go through the CSV parser, anything else through SheetJS. */
export async function readTableFile(file: string): Promise<ParsedSheet> {
  const bytes = await readFile(file);
  if (path.extname(file).toLowerCase() === ".csv") {
    return parseCsvToSheet(bytes.toString("utf8"));
  }
  return readWorkbookBytes(new Uint8Array(bytes));
}

export function tableToWorkbookBytes(table: Table, sheetName = "Sheet1"): Buffer {
  const grid: string[][] = [
    [...table.columns],
    ...table.rows.map((row) => table.columns.map((c) => sanitizeOutgoingCell(row[c]))),
  ];
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(grid), sheetName);
  const out: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return out;
}

export async function writeWorkbook(table: Table, file: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, tableToWorkbookBytes(table));
}
