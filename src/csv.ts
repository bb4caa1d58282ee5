import type { RawRow } from "./types.js";

export interface ParsedSheet {
  columns: string[];
  rows: RawRow[];
}

const stripBom = (text: string): string => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

/**
 * Header labels trimmed; blank labels dropped; exact repeats get `_2`, `_3`, ... so the
 * numbered-column pass can fold them later.
 */
export function dedupeHeaders(headers: unknown[]): Array<string | null> {
  const counts = new Map<string, number>();
  return headers.map((h) => {
    const label = String(h ?? "").trim();
    if (!label) return null;
    const n = (counts.get(label) ?? 0) + 1;
    counts.set(label, n);
    return n === 1 ? label : `${label}_${n}`;
  });
}

/** Build header-keyed rows from a grid whose first line is the header; blank lines are skipped. */
export function gridToSheet(grid: unknown[][]): ParsedSheet {
  const headers = dedupeHeaders(grid[0] ?? []);
  const columns = headers.filter((h): h is string => h !== null);
  const rows: RawRow[] = [];
  for (let r = 1; r < grid.length; r++) {
    const values = grid[r] ?? [];
    if (values.every((v) => v === null || v === undefined || String(v).trim() === "")) continue;
    const obj: RawRow = {};
    headers.forEach((h, idx) => {
      if (h === null) return;
      const v = values[idx];
      obj[h] = typeof v === "string" || typeof v === "number" || typeof v === "boolean" ? v : null;
    });
    rows.push(obj);
  }
  return { columns, rows };
}

/**
 * Parse CSV text into a grid using a simple state machine that handles quoted fields,
 * escaped quotes and commas or newlines within quotes.
 */
export function parseCsvGrid(csvText: string): string[][] {
  const text = stripBom(csvText);
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else {
      if (c === `"`) {
        inQuotes = true;
      } else if (c === ",") {
        pushField();
      } else if (c === "\n") {
        pushField();
        pushRow();
      } else if (c === "\r") {
        // ignore CR
      } else {
        field += c;
      }
    }
  }
  pushField();
  pushRow();
  // Trim possible trailing empty last row
  const last = rows[rows.length - 1];
  if (last && last.every((v) => v === "")) rows.pop();
  return rows;
}

export function parseCsvToSheet(csvText: string): ParsedSheet {
  return gridToSheet(parseCsvGrid(csvText));
}
