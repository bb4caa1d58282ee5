import { SheetSyncError, classifyRemoteError } from "./errors.js";
import { noopSink, type EventSink } from "./events.js";
import { sanitizeOutgoingCell } from "./sanitize.js";
import type { SheetStore } from "./sheetStore.js";
import type { SheetState, Table } from "./types.js";

/**
 * Module: Sheet Synchronizer
 * Purpose: Append a fused table to a shared remote sheet whose header may differ.
 * States: read header -> diff columns -> widen header + backfill -> append -> report.
 * The header only grows: new columns go to the end, existing rows get "" in them.
 * Steps are not transactional; re-running after a failure re-widens nothing and
 * re-backfills the same empty cells, but rows that were appended stay appended.
 */
export type SyncStage = "read_header" | "diff_columns" | "capacity" | "write_header" | "backfill" | "append";

export interface SyncOptions {
  cellLimit?: number;
  sink?: EventSink;
}

export interface SyncReport {
  status: "ok";
  appendedRows: number;
  totalRows: number;
  totalColumns: number;
  totalCells: number;
  newColumns: string[];
  headerWritten: boolean;
  backfilledRows: number;
}

export interface SyncFailure {
  status: "failed";
  error: SheetSyncError;
  appendedRows: 0;
  stage: SyncStage;
}

export type SyncResult = SyncReport | SyncFailure;

export const DEFAULT_CELL_LIMIT = 10_000_000;

/** 0 → A, 25 → Z, 26 → AA, 701 → ZZ, 702 → AAA. */
export function columnLetter(index: number): string {
  let n = Math.floor(index) + 1;
  let out = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

/** Local columns missing from the remote header, in local order. */
export function diffColumns(header: string[], local: string[]): string[] {
  const known = new Set(header);
  const added: string[] = [];
  for (const c of local) {
    if (known.has(c)) continue;
    known.add(c);
    added.push(c);
  }
  return added;
}

export async function readSheetState(store: SheetStore): Promise<SheetState> {
  const header = await store.readHeader();
  if (!header.length) return { header, rowCount: 0 };
  const firstColumn = await store.readFirstColumn();
  return { header, rowCount: Math.max(0, firstColumn.length - 1) };
}

export async function synchronizeSheet(store: SheetStore, table: Table, options: SyncOptions = {}): Promise<SyncResult> {
  const sink = options.sink ?? noopSink;
  const cellLimit = options.cellLimit ?? DEFAULT_CELL_LIMIT;
  let stage: SyncStage = "read_header";

  try {
    const state = await readSheetState(store);
    sink({ type: "sheet.header.read", columns: state.header.length, rows: state.rowCount });

    stage = "diff_columns";
    const newColumns = diffColumns(state.header, table.columns);
    const header = [...state.header, ...newColumns];
    const rows = table.rows.map((row) => header.map((c) => sanitizeOutgoingCell(row[c])));

    stage = "capacity";
    const projectedCells = (state.rowCount + rows.length + 1) * header.length;
    if (projectedCells > cellLimit) {
      throw new SheetSyncError(
        "RemoteCapacityExceeded",
        `Appending ${rows.length} rows would need ${projectedCells} cells, above the limit of ${cellLimit} cells`
      );
    }

    let backfilledRows = 0;
    if (newColumns.length) {
      stage = "write_header";
      await store.writeHeader(header);
      sink({ type: "sheet.header.widened", added: newColumns });

      if (state.rowCount > 0) {
        stage = "backfill";
        const range = `${columnLetter(state.header.length)}2:${columnLetter(header.length - 1)}${state.rowCount + 1}`;
        const blanks = Array.from({ length: state.rowCount }, () => newColumns.map(() => ""));
        await store.writeRange(range, blanks);
        backfilledRows = state.rowCount;
        sink({ type: "sheet.backfilled", range, rows: backfilledRows });
      }
    }

    stage = "append";
    const appendedRows = rows.length ? await store.appendRows(rows) : 0;
    sink({ type: "sheet.appended", rows: appendedRows });

    const totalRows = state.rowCount + appendedRows;
    return {
      status: "ok",
      appendedRows,
      totalRows,
      totalColumns: header.length,
      totalCells: (totalRows + 1) * header.length,
      newColumns,
      headerWritten: newColumns.length > 0,
      backfilledRows,
    };
  } catch (err) {
    const error = classifyRemoteError(err);
    sink({ type: "sheet.failed", stage, code: error.code, reason: error.reason });
    return { status: "failed", error, appendedRows: 0, stage };
  }
}
