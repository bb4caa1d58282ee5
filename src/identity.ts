import { createHash, randomUUID } from "node:crypto";
import { normalizeCell, splitCellValues } from "./sanitize.js";
import type { IdentityFieldMap, IdentityKey, RecordRow } from "./types.js";

/**
 * Module: Identity Keys
 * Purpose: Derive a stable, typed identity for a record from its noisy contact attributes,
 * and turn that identity into the `CompanyID` carried by every output row.
 * Precedence: website > phone > email > company name hash > random fallback.
 * The random branch is not reproducible: a record with no identifying attribute is its
 * own entity and does not merge across runs.
 */
export const DEFAULT_IDENTITY_FIELDS: IdentityFieldMap = {
  website: ["Website", "url", "urls", "URL"],
  phones: ["Phone1", "Phone2", "Phone3", "Phone4", "Phone", "phones", "Mobile"],
  email: ["Email", "emails"],
  companyName: ["CompanyNameEN", "CompanyNameFA", "CompanyName", "company_names"],
};

export interface IdentityOptions {
  fields?: IdentityFieldMap;
  defaultCountryCode?: string;
  minPhoneDigits?: number;
  random?: () => string;
}

const COMPANY_STOP_PHRASES = ["بین المللی"];
const COMPANY_STOP_WORDS = new Set([
  "company",
  "co",
  "ltd",
  "inc",
  "corp",
  "group",
  "private",
  "public",
  "holding",
  "international",
  "شرکت",
  "گروه",
  "سهامی",
  "خاص",
  "عام",
]);

const sha256Hex = (s: string): string => createHash("sha256").update(s, "utf8").digest("hex");
const md5Hex = (s: string): string => createHash("md5").update(s, "utf8").digest("hex");

export function normalizeDomain(input: string): string {
  let s = normalizeCell(input).toLowerCase();
  if (!s) return "";
  s = s.replace(/^mailto:/, "");
  s = s.replace(/^[a-z][a-z0-9+.-]*:\/\//, "");
  s = s.replace(/^www\./, "");
  s = s.split(/[/?#]/)[0] ?? "";
  s = s.replace(/\s+/g, "").replace(/\.+$/, "");
  return s;
}

/**
 * Canonical phone digits: `00` international prefix dropped, a single trunk `0` replaced
 * by the default country code. `+98 21 1234` and `0211234` both give `98211234`.
 */
export function normalizePhone(input: string, defaultCountryCode = "98"): string {
  let digits = normalizeCell(input).replace(/\D+/g, "");
  if (!digits) return "";
  if (digits.startsWith("00")) return digits.slice(2);
  if (digits.startsWith("0") && defaultCountryCode) digits = defaultCountryCode + digits.slice(1);
  return digits;
}

export function normalizeEmail(input: string): string {
  const s = normalizeCell(input).toLowerCase().replace(/^mailto:/, "").replace(/\s+/g, "");
  return s.includes("@") ? s : "";
}

export function normalizeCompanyName(input: string): string {
  let s = normalizeCell(input).toLowerCase();
  if (!s) return "";
  for (const phrase of COMPANY_STOP_PHRASES) s = s.split(phrase).join(" ");
  return s
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .split(/\s+/)
    .filter((t) => t && !COMPANY_STOP_WORDS.has(t))
    .join(" ");
}

// Case-insensitive lookup of the first listed column that carries a value
const lookupValues = (row: RecordRow, names: string[]): string[] => {
  const byLower = new Map<string, string>();
  for (const key of Object.keys(row)) {
    const lower = key.toLowerCase();
    if (!byLower.has(lower)) byLower.set(lower, key);
  }
  const out: string[] = [];
  for (const name of names) {
    const key = byLower.get(name.toLowerCase());
    if (key === undefined) continue;
    const cell = row[key] ?? "";
    out.push(...splitCellValues(cell));
  }
  return out;
};

export function resolveIdentityKey(row: RecordRow, options: IdentityOptions = {}): IdentityKey {
  const fields = options.fields ?? DEFAULT_IDENTITY_FIELDS;
  const minDigits = options.minPhoneDigits ?? 8;

  for (const candidate of lookupValues(row, fields.website)) {
    const domain = normalizeDomain(candidate);
    if (domain) return { kind: "website", value: domain };
  }

  for (const candidate of lookupValues(row, fields.phones)) {
    const digits = normalizePhone(candidate, options.defaultCountryCode);
    if (digits.length >= minDigits) return { kind: "phone", value: digits };
  }

  for (const candidate of lookupValues(row, fields.email)) {
    const email = normalizeEmail(candidate);
    if (email) return { kind: "email", value: email };
  }

  for (const candidate of lookupValues(row, fields.companyName)) {
    const raw = normalizeCell(candidate);
    if (!raw) continue;
    const name = normalizeCompanyName(raw);
    const basis = name.length >= 2 ? name : raw;
    return { kind: "company_name", value: sha256Hex(basis).slice(0, 12) };
  }

  const seed = options.random ? options.random() : randomUUID();
  return { kind: "random", value: md5Hex(seed).slice(0, 12) };
}

export const identityKeyToString = (key: IdentityKey): string => `${key.kind}:${key.value}`;

const COMPANY_ID_TAGS: Record<IdentityKey["kind"], string> = {
  website: "WEB",
  phone: "TEL",
  email: "MAIL",
  company_name: "NAME",
  random: "UNKNOWN",
};

export function companyIdFor(key: IdentityKey): string {
  const tag = COMPANY_ID_TAGS[key.kind];
  if (key.kind === "random") return `COMP_${tag}_${key.value.toUpperCase()}`;
  return `COMP_${tag}_${sha256Hex(identityKeyToString(key)).slice(0, 12).toUpperCase()}`;
}

/**
 * Recover a single id from a CompanyID cell that was pipe-joined by an earlier merge.
 */
export function canonicalCompanyId(cell: string): string {
  const s = normalizeCell(cell);
  if (!s) return "";
  const match = /COMP_[A-Z]+_[A-F0-9]+/.exec(s);
  if (match) return match[0];
  return splitCellValues(s)[0] ?? "";
}
