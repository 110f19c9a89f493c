/**
 * Cell value helpers: header normalisation and text coercion.
 */

/**
 * Normalize a header to a placeholder-friendly key.
 * Accented characters are folded to ASCII, the result is lower-cased and
 * inner spaces become underscores: "Şirket Adresi" → "sirket_adresi".
 */
export function normalizeHeader(header: string): string {
  if (!header) return "";
  return header
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .trim()
    .toLowerCase()
    .replace(/ /g, "_");
}

/** Record key for a header or a field named on the command line. */
export function fieldKey(name: string, normalize = true): string {
  return normalize ? normalizeHeader(name) : name.trim();
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Calendar fields of a date cell, month 1-based. */
export interface DateParts {
  y: number;
  m: number;
  d: number;
  H: number;
  M: number;
  S: number;
}

/** YYYY-MM-DD, followed by HH:MM:SS unless the time is midnight. */
export function formatDateParts({ y, m, d, H, M, S }: DateParts): string {
  const date = `${y}-${pad2(m)}-${pad2(d)}`;
  if (H === 0 && M === 0 && S === 0) return date;
  return `${date} ${pad2(H)}:${pad2(M)}:${pad2(S)}`;
}

function formatDateObject(d: Date): string {
  return formatDateParts({
    y: d.getFullYear(),
    m: d.getMonth() + 1,
    d: d.getDate(),
    H: d.getHours(),
    M: d.getMinutes(),
    S: d.getSeconds(),
  });
}

/**
 * Convert a raw cell value to its text form.
 * null/undefined → "", strings trimmed, dates as YYYY-MM-DD[ HH:MM:SS],
 * objects and arrays as compact JSON.
 */
export function stringifyCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : formatDateObject(value);
  }
  return JSON.stringify(value);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Reformat an ISO date (YYYY-MM-DD, optionally followed by a time) as
 * DD/MM/YYYY. Values that are not ISO dates are returned unchanged.
 */
export function formatDateField(value: string): string {
  const m = ISO_DATE.exec(value.split(" ")[0] ?? "");
  if (!m) return value;
  return `${m[3]}/${m[2]}/${m[1]}`;
}
