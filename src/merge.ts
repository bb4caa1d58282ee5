import { canonicalCompanyId, companyIdFor, resolveIdentityKey, type IdentityOptions } from "./identity.js";
import { collectColumns, mergeCellValues } from "./sanitize.js";
import type { RecordRow, Table } from "./types.js";
import { COMPANY_ID } from "./types.js";

/**
 * Module: Record Merge
 * Purpose: Group rows that describe the same entity and fold each group into one row.
 * - Rows keep an upstream `CompanyID` when they carry one; otherwise the id is derived
 *   from the row's identity key.
 * - A single-row group is emitted as is; a larger group gets, per column, the distinct
 *   non-empty values of its rows in row order joined with `" | "`.
 * - A post-pass blanks a value repeated in `repeatThreshold` or more columns of the same
 *   row, keeping the first occurrence.
 */
export interface MergeOptions {
  identity?: IdentityOptions;
  idColumn?: string;
  repeatThreshold?: number;
}

export interface MergeResult {
  table: Table;
  groups: number;
  mergedGroups: number;
  repeatsBlanked: number;
}

/** Picks the id column: explicit, else `CompanyID`, else the first `company…id` header. */
export function findIdColumn(columns: string[], preferred?: string): string {
  if (preferred) return preferred;
  if (columns.includes(COMPANY_ID)) return COMPANY_ID;
  const guess = columns.find((c) => {
    const lower = c.toLowerCase();
    return lower.includes("company") && lower.includes("id");
  });
  return guess ?? COMPANY_ID;
}

export function assignCompanyId(row: RecordRow, idColumn: string, identity?: IdentityOptions): string {
  const upstream = canonicalCompanyId(row[idColumn] ?? "");
  return upstream || companyIdFor(resolveIdentityKey(row, identity));
}

export function blankRepeatedValues(
  row: RecordRow,
  columns: string[],
  threshold: number,
  skip: ReadonlySet<string>
): number {
  const seen = new Map<string, string[]>();
  for (const col of columns) {
    const value = row[col];
    if (!value || skip.has(col)) continue;
    const cols = seen.get(value) ?? [];
    cols.push(col);
    seen.set(value, cols);
  }
  let blanked = 0;
  for (const cols of seen.values()) {
    if (cols.length < threshold) continue;
    for (const col of cols.slice(1)) {
      row[col] = "";
      blanked++;
    }
  }
  return blanked;
}

export function mergeRecords(input: Table, options: MergeOptions = {}): MergeResult {
  const idColumn = findIdColumn(input.columns, options.idColumn);
  const threshold = options.repeatThreshold ?? 3;
  const columns = collectColumns(input.rows, [idColumn, ...input.columns.filter((c) => c !== idColumn)]);

  const groups = new Map<string, RecordRow[]>();
  for (const row of input.rows) {
    const id = assignCompanyId(row, idColumn, options.identity);
    const list = groups.get(id) ?? [];
    list.push(row);
    groups.set(id, list);
  }

  const rows: RecordRow[] = [];
  let mergedGroups = 0;
  let repeatsBlanked = 0;
  const skip = new Set([idColumn]);

  for (const [id, members] of groups) {
    const merged: RecordRow = { [idColumn]: id };
    if (members.length === 1) {
      const only = members[0] ?? {};
      for (const c of columns) if (c !== idColumn) merged[c] = only[c] ?? "";
    } else {
      mergedGroups++;
      for (const c of columns) {
        if (c === idColumn) continue;
        merged[c] = mergeCellValues(members.map((m) => m[c] ?? ""));
      }
    }
    repeatsBlanked += blankRepeatedValues(merged, columns, threshold, skip);
    rows.push(merged);
  }

  return {
    table: { columns, rows },
    groups: groups.size,
    mergedGroups,
    repeatsBlanked,
  };
}
