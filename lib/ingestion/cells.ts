// lib/ingestion/cells.ts
import { format, isValid, parse, parseISO } from "date-fns";

const STRIP_CHARS = /[¥￥$€£,，%％\s]/g;
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Strip currency symbols, thousands separators and percent signs, then parse.
 * Anything that is still not a plain decimal literal yields null.
 */
export function cleanNumeric(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const stripped = value.replace(STRIP_CHARS, "");
  if (!DECIMAL_LITERAL.test(stripped)) return null;

  const n = Number(stripped);
  return Number.isFinite(n) ? n : null;
}

// `yyyy` accepts 1-4 digits, so "1/5/24" would otherwise parse as year 0001.
const MIN_YEAR = 1000;

const plausible = (d: Date): boolean => isValid(d) && d.getFullYear() >= MIN_YEAR;

const DATE_FORMATS = [
  "yyyy-MM-dd",
  "yyyy/MM/dd",
  "yyyy/M/d",
  "yyyy-M-d",
  "yyyy.MM.dd",
  "yyyy年M月d日",
  "yyyyMMdd",
  "yyyy/MM/dd HH:mm",
  "yyyy/MM/dd HH:mm:ss",
  "yyyy-MM-dd HH:mm:ss",
  "MM/dd/yyyy",
  "M/d/yyyy",
  "M/d/yy",
];

/** Parse a cell into a `YYYY-MM-DD` calendar date, or null when no format fits. */
export function toIsoDate(value: unknown): string | null {
  if (value instanceof Date) return plausible(value) ? format(value, "yyyy-MM-dd") : null;
  if (typeof value !== "string") return null;

  const text = value.trim();
  if (!text) return null;

  const reference = new Date(2000, 0, 1);
  for (const f of DATE_FORMATS) {
    const d = parse(text, f, reference);
    if (plausible(d)) return format(d, "yyyy-MM-dd");
  }

  const iso = parseISO(text);
  return plausible(iso) ? format(iso, "yyyy-MM-dd") : null;
}

/** Trimmed text, with empty cells as null. */
export function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text ? text : null;
}

export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || String(value).trim() === "";
}
