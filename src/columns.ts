import { mergeCellValues } from "./sanitize.js";
import type { ColumnGroup, RecordRow, Table } from "./types.js";

/**
 * Module: Column Reconciliation
 * Purpose: Collapse the column variants emitted by different extractors into one canonical
 * schema without dropping values.
 * Passes:
 * - numbered: `Phone`, `Phone1`, `Phone2` fold into the shortest name.
 * - case: `Email` / `email` fold into the first spelling seen.
 * - bilingual: `AddressEN` / `AddressFA`, `x_en` / `x_fa`, `Name` / `NameFA`,
 *   `Name` / `Name_translated` fold into the English column.
 * - alias: known synonyms (`faxes` / `Fax`, `url` / `Website`, ...) fold into the alias
 *   group's name.
 * Folding joins distinct non-empty values per row with `" | "`. Passes repeat until no
 * group is left, so reconciling an already reconciled table changes nothing.
 */
export interface AliasGroup {
  canonical: string;
  aliases: string[];
}

export const DEFAULT_ALIAS_GROUPS: AliasGroup[] = [
  { canonical: "fax", aliases: ["faxes", "Fax"] },
  { canonical: "phones", aliases: ["phone1", "Phone1", "Phone", "phone"] },
  { canonical: "urls", aliases: ["url", "Website", "website", "URL"] },
  { canonical: "emails", aliases: ["Email", "OtherEmails"] },
];

const BILINGUAL_SUFFIXES: ReadonlyArray<readonly [string, string]> = [
  ["EN", "FA"],
  ["_en", "_fa"],
  ["English", "Persian"],
  ["", "FA"],
  ["", "_translated"],
];

export interface ReconcileOptions {
  aliases?: AliasGroup[];
}

export interface ReconcileResult {
  table: Table;
  groups: ColumnGroup[];
}

// Fold `members` (value order) into `canonical`. The canonical column keeps its
// position, or takes the first member's position when it is a new name.
function foldColumns(table: Table, canonical: string, members: string[]): void {
  const dropped = new Set(members.filter((m) => m !== canonical));
  for (const row of table.rows) {
    const merged = mergeCellValues(members.map((m) => row[m] ?? ""));
    for (const m of dropped) delete row[m];
    row[canonical] = merged;
  }
  const anchor = members.includes(canonical) ? canonical : members[0];
  table.columns = table.columns.flatMap((c) => (c === anchor ? [canonical] : dropped.has(c) ? [] : [c]));
}

const numberedBase = (name: string): { base: string; numbered: boolean } => {
  const lower = name.toLowerCase();
  const m = /^(.+?)_?\d+$/.exec(lower);
  if (m && /\p{L}/u.test(m[1] ?? "")) return { base: m[1] ?? lower, numbered: true };
  return { base: lower, numbered: false };
};

const byLengthThenName = (a: string, b: string): number =>
  a.length - b.length || (a < b ? -1 : a > b ? 1 : 0);

export function findNumberedGroups(columns: string[]): ColumnGroup[] {
  const buckets = new Map<string, { members: string[]; numbered: boolean }>();
  for (const col of columns) {
    const { base, numbered } = numberedBase(col);
    const bucket = buckets.get(base) ?? { members: [], numbered: false };
    bucket.members.push(col);
    bucket.numbered = bucket.numbered || numbered;
    buckets.set(base, bucket);
  }
  const groups: ColumnGroup[] = [];
  for (const { members, numbered } of buckets.values()) {
    if (members.length < 2 || !numbered) continue;
    const sorted = [...members].sort(byLengthThenName);
    groups.push({ kind: "numbered", canonical: sorted[0] ?? members[0] ?? "", members: sorted });
  }
  return groups;
}

export function findCaseDuplicateGroups(columns: string[]): ColumnGroup[] {
  const buckets = new Map<string, string[]>();
  for (const col of columns) {
    const key = col.toLowerCase();
    const list = buckets.get(key) ?? [];
    list.push(col);
    buckets.set(key, list);
  }
  const groups: ColumnGroup[] = [];
  for (const members of buckets.values()) {
    if (new Set(members).size < 2) continue;
    groups.push({ kind: "case", canonical: members[0] ?? "", members });
  }
  return groups;
}

export function findBilingualPairs(columns: string[]): ColumnGroup[] {
  const present = new Set(columns);
  const taken = new Set<string>();
  const groups: ColumnGroup[] = [];
  for (const col of columns) {
    if (taken.has(col)) continue;
    for (const [en, fa] of BILINGUAL_SUFFIXES) {
      let partner: string | undefined;
      if (en && col.endsWith(en)) partner = col.slice(0, -en.length) + fa;
      else if (!en) partner = col + fa;
      if (!partner || partner === col || !present.has(partner) || taken.has(partner)) continue;
      groups.push({ kind: "bilingual", canonical: col, members: [col, partner] });
      taken.add(col);
      taken.add(partner);
      break;
    }
  }
  return groups;
}

export function findAliasGroups(columns: string[], aliases: AliasGroup[]): ColumnGroup[] {
  const groups: ColumnGroup[] = [];
  const claimed = new Set<string>();
  const firstMatch = (name: string, exclude?: string): string | undefined =>
    columns.find((c) => c.toLowerCase() === name.toLowerCase() && c !== exclude && !claimed.has(c));

  for (const group of aliases) {
    const main = firstMatch(group.canonical);
    const others: string[] = [];
    for (const alias of group.aliases) {
      const col = firstMatch(alias, main);
      if (col && !others.includes(col)) others.push(col);
    }
    const members = main ? [main, ...others] : others;
    if (members.length < 2) continue;
    members.forEach((m) => claimed.add(m));
    groups.push({ kind: "alias", canonical: group.canonical, members });
  }
  return groups;
}

// A group whose members are all one name folds nothing
const foldsSomething = (group: ColumnGroup): boolean => new Set(group.members).size > 1;

function applyGroups(table: Table, groups: ColumnGroup[]): void {
  for (const g of groups) foldColumns(table, g.canonical, g.members);
}

export function reconcileColumns(input: Table, options: ReconcileOptions = {}): ReconcileResult {
  const aliases = options.aliases ?? [];
  const table: Table = {
    columns: [...new Set(input.columns)],
    rows: input.rows.map((row): RecordRow => ({ ...row })),
  };
  const applied: ColumnGroup[] = [];
  const maxRounds = table.columns.length + 1;

  for (let round = 0; round < maxRounds; round++) {
    let changed = false;
    const passes: Array<(columns: string[]) => ColumnGroup[]> = [
      findNumberedGroups,
      findCaseDuplicateGroups,
      findBilingualPairs,
      (columns) => findAliasGroups(columns, aliases),
    ];
    for (const find of passes) {
      const groups = find(table.columns).filter(foldsSomething);
      if (!groups.length) continue;
      applyGroups(table, groups);
      applied.push(...groups);
      changed = true;
    }
    if (!changed) break;
  }

  return { table, groups: applied };
}
