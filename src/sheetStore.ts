import { google, type sheets_v4 } from "googleapis";

/**
 * Module: Remote Sheet Store
 * Purpose: The five range operations the synchronizer needs from a remote tabular store.
 * Ranges passed to `writeRange` are A1 ranges without the sheet prefix (`C2:D10`).
 */
export interface SheetStore {
  readHeader(): Promise<string[]>;
  writeHeader(header: string[]): Promise<void>;
  // Column A including the header cell; used as the row-count probe
  readFirstColumn(): Promise<string[]>;
  writeRange(range: string, values: string[][]): Promise<void>;
  // Appends after the last row without overwriting; resolves to the rows written
  appendRows(rows: string[][]): Promise<number>;
}

export interface GoogleSheetStoreOptions {
  spreadsheetId: string;
  sheetName: string;
  credentialsFile?: string;
  client?: sheets_v4.Sheets;
}

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

const quoteSheetName = (name: string): string => `'${name.replace(/'/g, "''")}'`;

const cellText = (v: unknown): string => (v === null || v === undefined ? "" : String(v));

export class GoogleSheetStore implements SheetStore {
  private readonly sheets: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly prefix: string;

  constructor(options: GoogleSheetStoreOptions) {
    this.spreadsheetId = options.spreadsheetId;
    this.prefix = quoteSheetName(options.sheetName);
    this.sheets =
      options.client ??
      google.sheets({
        version: "v4",
        auth: new google.auth.GoogleAuth({ keyFile: options.credentialsFile, scopes: SCOPES }),
      });
  }

  async readHeader(): Promise<string[]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: `${this.prefix}!1:1`,
      majorDimension: "ROWS",
    });
    const first: unknown[] = res.data.values?.[0] ?? [];
    return first.map(cellText);
  }

  async writeHeader(header: string[]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${this.prefix}!A1`,
      valueInputOption: "RAW",
      requestBody: { values: [header] },
    });
  }

  async readFirstColumn(): Promise<string[]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: `${this.prefix}!A:A`,
      majorDimension: "COLUMNS",
    });
    const first: unknown[] = res.data.values?.[0] ?? [];
    return first.map(cellText);
  }

  async writeRange(range: string, values: string[][]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${this.prefix}!${range}`,
      valueInputOption: "RAW",
      requestBody: { values },
    });
  }

  async appendRows(rows: string[][]): Promise<number> {
    const res = await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${this.prefix}!A1`,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: rows },
    });
    return Number(res.data.updates?.updatedRows ?? rows.length);
  }
}
