import type { FieldValue, NetQuantity } from "./types";
import {
  UNIT_MAP,
  CANONICAL_UNITS,
  NOT_FOUND_SENTINELS,
  LEGAL_SUFFIXES,
  COUNTRY_ALIASES,
} from "./normalization-maps";

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Longest spellings first so "ml" wins over "m" and "kgs" over "kg"
const UNIT_ALTERNATION = Object.keys(UNIT_MAP)
  .sort((a, b) => b.length - a.length)
  .map(escapeRegExp)
  .join("|");

const QUANTITY_RE = new RegExp(
  `(\\d{1,3}(?:,\\d{3})+|\\d+(?:\\.\\d+)?)\\s*(${UNIT_ALTERNATION})(?![a-z])`,
  "i"
);

const CURRENCY_MARKER_RE = /(₹|\brs\.?|\binr\b|\bmrp\b|\brupees?\b)/i;
const AMOUNT_RE = /(\d{1,3}(?:,\d{2,3})+|\d+)(?:\.(\d{1,2}))?/;

const DAY_MONTH_YEAR_RE = /\b(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})\b/;
const MONTH_YEAR_RE = /\b(0?[1-9]|1[0-2])[/.-](\d{4})\b/;
const MONTH_NAME_RE =
  /\b(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?[\s,'/-]*(\d{4}|\d{2})\b/i;
const DURATION_RE = /\b\d+\s*(?:days?|weeks?|months?|mths?|yrs?|years?)\b/i;

const EMAIL_RE = /[\w.+-]+@[\w-]+\.[\w.-]+/;
const PHONE_RE = /\+?\d[\d\s\-()]{8,}\d/;

// ===== Text =====

export function cleanText(raw: string): string {
  return raw.replace(/\s+/g, " ").trim();
}

export function isNotFoundSentinel(raw: string): boolean {
  const lower = cleanText(raw).toLowerCase().replace(/[.:]+$/, "");
  return NOT_FOUND_SENTINELS.has(lower);
}

/** True for values that carry nothing: empty, whitespace, or a "not found" marker */
export function isBlankValue(value: FieldValue): boolean {
  if (typeof value !== "string") return false;
  return cleanText(value) === "" || isNotFoundSentinel(value);
}

export function formatFieldValue(value: FieldValue): string {
  if (typeof value === "string") return value;
  return `${value.magnitude} ${value.unit}`;
}

// ===== Net Quantity =====

export function parseNetQuantity(raw: FieldValue): NetQuantity | null {
  if (typeof raw !== "string") {
    if (!Number.isFinite(raw.magnitude) || raw.magnitude <= 0) return null;
    const unit = UNIT_MAP[raw.unit.toLowerCase()] ?? (CANONICAL_UNITS.has(raw.unit) ? raw.unit : null);
    return unit ? { magnitude: raw.magnitude, unit } : null;
  }

  const match = raw.match(QUANTITY_RE);
  if (!match) return null;

  const magnitude = parseFloat(match[1].replace(/,/g, ""));
  const unit = UNIT_MAP[match[2].toLowerCase()];
  if (!unit || !Number.isFinite(magnitude) || magnitude <= 0) return null;
  return { magnitude, unit };
}

// ===== MRP =====

/**
 * Pull a positive rupee amount out of label text such as
 * "MRP: ₹ 1,29,999.00 (Incl. of all taxes)" or "Rs. 45/-".
 * Bare quantities ("200 g") are not prices.
 */
export function parseCurrencyAmount(raw: string): number | null {
  const text = cleanText(raw);
  if (!text) return null;

  const marker = text.match(CURRENCY_MARKER_RE);
  if (!marker && QUANTITY_RE.test(text)) return null;

  const searchFrom = marker?.index !== undefined ? marker.index + marker[0].length : 0;
  const amount = text.slice(searchFrom).match(AMOUNT_RE);
  if (!amount) return null;

  const whole = amount[1].replace(/,/g, "");
  const value = parseFloat(amount[2] ? `${whole}.${amount[2]}` : whole);
  if (!Number.isFinite(value) || value <= 0) return null;
  return value;
}

// ===== Dates =====

export function isLabelDate(raw: string): boolean {
  const text = cleanText(raw);

  const dmy = text.match(DAY_MONTH_YEAR_RE);
  if (dmy) {
    const day = parseInt(dmy[1], 10);
    const month = parseInt(dmy[2], 10);
    if (day >= 1 && day <= 31 && month >= 1 && month <= 12) return true;
  }

  return MONTH_YEAR_RE.test(text) || MONTH_NAME_RE.test(text) || DURATION_RE.test(text);
}

// ===== Country of Origin =====

const COUNTRY_PATTERNS: [RegExp, string][] = Object.keys(COUNTRY_ALIASES)
  .sort((a, b) => b.length - a.length)
  .map((alias) => [new RegExp(`(^|[^a-z])${escapeRegExp(alias)}(?![a-z])`, "i"), COUNTRY_ALIASES[alias]]);

export function normalizeCountry(raw: string): string | null {
  const text = cleanText(raw);
  if (!text) return null;
  for (const [pattern, canonical] of COUNTRY_PATTERNS) {
    if (pattern.test(text)) return canonical;
  }
  return null;
}

// ===== Consumer Care, Batch, Licence =====

export function hasContactDetails(raw: string): boolean {
  if (EMAIL_RE.test(raw)) return true;
  const phone = raw.match(PHONE_RE);
  return phone !== null && phone[0].replace(/\D/g, "").length >= 10;
}

export function parseBatchCode(raw: string): string | null {
  const code = cleanText(raw)
    .replace(/^(?:batch|lot|b\.?)\s*(?:no\.?|number|code)?\s*[:#.-]?\s*/i, "")
    .trim();
  if (!/^[A-Z0-9][A-Z0-9/-]{2,19}$/i.test(code)) return null;
  return /\d/.test(code) ? code.toUpperCase() : null;
}

/** FSSAI licence and registration numbers are 14 digits */
export function parseFssaiLicense(raw: string): string | null {
  const digits = raw.replace(/\D/g, "");
  return digits.length === 14 ? digits : null;
}

// ===== Manufacturer Identity =====

/**
 * Case/whitespace-folded manufacturer identity used to key history.
 * "Acme Foods Pvt. Ltd." and "ACME FOODS" share one key. A name made only
 * of legal suffixes folds to "", which identifies nobody.
 */
export function normalizeManufacturerKey(name: string): string {
  let key = cleanText(name.toLowerCase().replace(/[.,&()]/g, " "));

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const suffix of LEGAL_SUFFIXES) {
      if (key === suffix || key.endsWith(` ${suffix}`)) {
        key = key.slice(0, -suffix.length).trim();
        stripped = true;
        break;
      }
    }
  }

  return key;
}
