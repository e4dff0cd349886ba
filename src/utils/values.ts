/**
 * Cell value helpers shared by coercion, validation and enrichment
 */

import type { CellValue, RecordId, Row } from "../types/data-model.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// YYYY-MM-DD with an optional time part ("T" or space separated) and optional Z / offset
const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Narrow a cell to a finite number, or null
 */
export function toFiniteNumber(value: CellValue | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/**
 * Division that degrades to null instead of producing NaN or Infinity
 */
export function safeDivide(
  numerator: CellValue | undefined,
  denominator: CellValue | undefined,
): number | null {
  const n = toFiniteNumber(numerator);
  const d = toFiniteNumber(denominator);
  if (n === null || d === null || d === 0) {
    return null;
  }
  const result = n / d;
  return Number.isFinite(result) ? result : null;
}

/**
 * Parse a date string (date-only values are UTC midnight)
 * Returns null for anything that is not a real calendar date
 */
export function parseDateValue(value: CellValue | undefined): Date | null {
  if (typeof value !== "string") {
    return null;
  }
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "", zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const ms = Number(fraction.padEnd(3, "0").slice(0, 3));

  let time = Date.UTC(year, month - 1, day, Number(h), Number(mi), Number(s), ms);
  const check = new Date(Date.UTC(year, month - 1, day));
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    Number(h) > 23 ||
    Number(mi) > 59 ||
    Number(s) > 59
  ) {
    return null;
  }

  if (zone && zone !== "Z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    const digits = zone.slice(1).replace(":", "");
    const offsetMinutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
    time -= sign * offsetMinutes * 60 * 1000;
  }

  return new Date(time);
}

/**
 * Canonical string form: YYYY-MM-DD at UTC midnight, full ISO otherwise
 */
export function formatDateValue(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
}

/**
 * Whole days from `from` to `to`, rounded toward negative infinity
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

/**
 * "  local   comercial " → "Local Comercial"
 */
export function toTitleCase(value: string): string {
  return value
    .trim()
    .split(/\s+/)
    .map((word) =>
      word
        .split("-")
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
        .join("-"),
    )
    .join(" ");
}

/**
 * The record's id when it is a usable key, otherwise null
 */
export function recordIdOf(record: Readonly<Row>): RecordId | null {
  const id = record.id;
  if (typeof id === "number") {
    return Number.isFinite(id) ? id : null;
  }
  return typeof id === "string" && id !== "" ? id : null;
}

/**
 * Compact number rendering for finding messages
 */
export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}
