import { z } from "zod";
import { hasPersianScript, normalizeCell } from "./sanitize.js";
import type { CellValue, RawRecord, RecordRow } from "./types.js";
import { FILE_NAME } from "./types.js";

/**
 * Module: OCR + QR Flattening
 * Purpose: Turn the merged OCR/QR extraction output (one item per uploaded file, one
 * field-object per page) into one record per physical page, keeping the `file_name`
 * back-reference.
 * Shape:
 * - list fields spread over numbered columns (`Email`, `Email2`, ...; phones as
 *   `Phone1..N`).
 * - company names and addresses are split by script into `...EN` / `...FA`.
 * - persons become `ContactName[n]` plus `PositionEN[n]` / `PositionFA[n]`.
 * - nested objects become `<key>_<subkey>`; QR payloads land in `QRLink`.
 */
export const FIELD_MAPPING: Record<string, string> = {
  addresses: "Address",
  phones: "Phone",
  faxes: "Fax",
  emails: "Email",
  urls: "Website",
  url: "Website",
  telegram: "Telegram",
  instagram: "Instagram",
  linkedin: "LinkedIn",
  company_names: "CompanyName",
  services: "Services",
  persons: "ContactName",
  notes: "Notes",
};

const SKIPPED_FIELDS = new Set(["ocr_text", "page", "qr_link", "qr_links"]);
const BILINGUAL_FIELDS = new Set(["company_names", "addresses"]);

const fileItemSchema = z
  .object({
    file_id: z.union([z.string(), z.number()]).nullish(),
    file_name: z.string().min(1),
    result: z.unknown(),
  })
  .passthrough();

type FieldObject = Record<string, unknown>;

const isFieldObject = (v: unknown): v is FieldObject => typeof v === "object" && v !== null && !Array.isArray(v);

const asCell = (v: unknown): CellValue => {
  if (v === null || v === undefined) return v;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  if (Array.isArray(v)) return v.map(asCell);
  if (isFieldObject(v)) {
    const out: { [key: string]: CellValue } = {};
    for (const [k, inner] of Object.entries(v)) out[k] = asCell(inner);
    return out;
  }
  return String(v);
};

const toList = (v: unknown): unknown[] => (Array.isArray(v) ? v : v === null || v === undefined ? [] : [v]);

// Store under `base`, or the next free `base2`, `base3`, ...
function put(record: RecordRow, base: string, value: unknown): void {
  const s = normalizeCell(asCell(value));
  if (!s) return;
  if (!record[base]) {
    record[base] = s;
    return;
  }
  let n = 2;
  while (record[`${base}${n}`]) n++;
  record[`${base}${n}`] = s;
}

const suffix = (idx: number): string => (idx > 1 ? String(idx) : "");

function putPersons(record: RecordRow, persons: unknown): void {
  toList(persons).forEach((person, i) => {
    const idx = i + 1;
    if (!isFieldObject(person)) {
      put(record, `ContactName${suffix(idx)}`, person);
      return;
    }
    put(record, `ContactName${suffix(idx)}`, person.name);
    const position = normalizeCell(asCell(person.position));
    if (position) {
      const lang = hasPersianScript(position) ? "FA" : "EN";
      put(record, `Position${lang}${suffix(idx)}`, position);
    }
  });
}

function putBilingual(record: RecordRow, base: string, values: unknown): void {
  const items = toList(values)
    .map((v) => normalizeCell(asCell(v)))
    .filter(Boolean);
  const fa = items.find((s) => hasPersianScript(s));
  const en = items.find((s) => !hasPersianScript(s));
  if (fa) put(record, `${base}FA`, fa);
  if (en) put(record, `${base}EN`, en);
  let n = 2;
  for (const s of items) {
    if (s === fa || s === en) continue;
    put(record, `${base}${n++}`, s);
  }
}

export function flattenPage(fields: FieldObject, qrLinks: unknown[] = []): RecordRow {
  const record: RecordRow = {};
  for (const [key, value] of Object.entries(fields)) {
    if (SKIPPED_FIELDS.has(key) || value === null || value === undefined) continue;
    const base = FIELD_MAPPING[key] ?? key;

    if (key === "persons") {
      putPersons(record, value);
    } else if (BILINGUAL_FIELDS.has(key)) {
      putBilingual(record, base, value);
    } else if (key === "phones") {
      toList(value).forEach((phone, i) => put(record, `Phone${i + 1}`, phone));
    } else if (Array.isArray(value)) {
      for (const item of value) put(record, base, item);
    } else if (isFieldObject(value)) {
      for (const [sub, inner] of Object.entries(value)) put(record, `${key}_${sub}`, inner);
    } else {
      put(record, base, value);
    }
  }
  const links = [...qrLinks, ...toList(fields.qr_links), ...toList(fields.qr_link)];
  for (const link of links) {
    const s = normalizeCell(asCell(link));
    if (s && !Object.values(record).includes(s)) put(record, "QRLink", s);
  }
  return record;
}

interface PageInput {
  page?: number;
  fields: FieldObject;
  qrLinks: unknown[];
}

function pagesOf(result: unknown): PageInput[] {
  if (isFieldObject(result)) {
    if (isFieldObject(result.result)) {
      return [{ fields: result.result, qrLinks: toList(result.qr_link) }];
    }
    return [{ fields: result, qrLinks: [] }];
  }
  if (!Array.isArray(result)) return [];
  const pages: PageInput[] = [];
  result.forEach((entry, i) => {
    if (!isFieldObject(entry)) return;
    const page = typeof entry.page === "number" ? entry.page : i + 1;
    if (isFieldObject(entry.result)) {
      pages.push({ page, fields: entry.result, qrLinks: toList(entry.qr_link) });
    } else if (!("result" in entry)) {
      pages.push({ page, fields: entry, qrLinks: [] });
    }
  });
  return pages;
}

/**
 * Flatten the parsed OCR/QR JSON. Items without a `file_name` and pages yielding no
 * field are skipped.
 */
export function flattenOcrQr(data: unknown): RawRecord[] {
  if (!Array.isArray(data)) return [];
  const records: RawRecord[] = [];
  for (const item of data) {
    const parsed = fileItemSchema.safeParse(item);
    if (!parsed.success) continue;
    const { file_name, file_id, result } = parsed.data;
    for (const { page, fields, qrLinks } of pagesOf(result)) {
      const values = flattenPage(fields, qrLinks);
      if (!Object.keys(values).length) continue;
      const row: RecordRow = { [FILE_NAME]: file_name };
      if (file_id !== null && file_id !== undefined) row.file_id = String(file_id);
      records.push({
        source: "OCR_QR",
        origin: { file: file_name, page },
        values: { ...row, ...values },
      });
    }
  }
  return records;
}
