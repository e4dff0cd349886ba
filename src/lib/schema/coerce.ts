/**
 * Raw row coercion
 * Maps loader output onto the declared schema: header aliases, typed values,
 * explicit nulls for anything missing or unparseable
 */

import type { CellValue, Row, RecordSchema, SchemaField } from "../../types/data-model.js";
import { RecordBatch } from "../batch/record-batch.js";
import { SchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { formatDateValue, parseDateValue, toTitleCase } from "../../utils/values.js";

export type RawRow = Record<string, unknown>;

const NULL_TOKENS = new Set(["", "na", "n/a", "nan", "null", "none"]);
const TRUE_TOKENS = new Set(["true", "yes", "si", "1"]);
const FALSE_TOKENS = new Set(["false", "no", "0"]);

/**
 * Resolve which source header feeds each declared field
 * Matching is exact first, then case-insensitive on trimmed names
 */
export function resolveColumnMapping(
  headers: readonly string[],
  schema: RecordSchema,
): Map<string, string | null> {
  const byLowerName = new Map<string, string>();
  for (const header of headers) {
    byLowerName.set(header.trim().toLowerCase(), header);
  }

  const mapping = new Map<string, string | null>();
  const missingRequired: string[] = [];

  for (const field of schema.fields) {
    const candidates = [field.name, ...(field.aliases ?? [])];
    const exact = candidates.find((name) => headers.includes(name));
    const loose = candidates
      .map((name) => byLowerName.get(name.toLowerCase()))
      .find((header) => header !== undefined);
    const source = exact ?? loose ?? null;

    if (source === null && !field.nullable) {
      missingRequired.push(field.name);
    }
    mapping.set(field.name, source);
  }

  if (missingRequired.length > 0) {
    throw new SchemaError(
      `Missing required columns for schema "${schema.name}": ${missingRequired.join(", ")}`,
      { missingColumns: missingRequired, headers: [...headers] },
    );
  }

  return mapping;
}

/**
 * Coerce one raw value to the field's semantic type, or null
 */
export function coerceValue(value: unknown, field: SchemaField): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" && NULL_TOKENS.has(value.trim().toLowerCase())) {
    return null;
  }

  switch (field.type) {
    case "string":
      return coerceString(value, field);
    case "number":
      return coerceNumber(value);
    case "integer": {
      const n = coerceNumber(value);
      return n !== null && Number.isInteger(n) ? n : null;
    }
    case "date":
      return coerceDate(value);
    case "boolean":
      return coerceBoolean(value);
  }
}

function coerceString(value: unknown, field: SchemaField): string | null {
  let text: string;
  if (value instanceof Date) {
    text = Number.isNaN(value.getTime()) ? "" : formatDateValue(value);
  } else if (typeof value === "string") {
    text = value;
  } else if (typeof value === "number" || typeof value === "boolean") {
    text = String(value);
  } else {
    return null;
  }

  switch (field.normalize ?? "trim") {
    case "none":
      return text;
    case "trim":
      return text.trim();
    case "title":
      return toTitleCase(text);
  }
}

function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  // Plain numerals, exponent form included, parse as they are
  const direct = Number(value.trim());
  if (Number.isFinite(direct)) {
    return direct;
  }
  // Drop currency symbols, thousands separators and spaces
  const cleaned = value.replace(/[^\d.\-]/g, "");
  if (cleaned === "" || cleaned === "-" || cleaned === ".") {
    return null;
  }
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function coerceDate(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatDateValue(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const parsed = parseDateValue(value);
  return parsed ? formatDateValue(parsed) : null;
}

function coerceBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value === 1 ? true : value === 0 ? false : null;
  }
  if (typeof value === "string") {
    const token = value.trim().toLowerCase();
    if (TRUE_TOKENS.has(token)) return true;
    if (FALSE_TOKENS.has(token)) return false;
  }
  return null;
}

/**
 * Build a typed RecordBatch from raw rows
 *
 * @param rawRows - Rows keyed by source header
 * @param headers - Source headers in file order
 * @throws SchemaError when a non-nullable column has no source header
 */
export function coerceRows(
  rawRows: readonly RawRow[],
  headers: readonly string[],
  schema: RecordSchema,
): RecordBatch {
  const mapping = resolveColumnMapping(headers, schema);

  const mappedHeaders = new Set([...mapping.values()].filter((h): h is string => h !== null));
  const undeclared = headers.filter((h) => !mappedHeaders.has(h));
  if (undeclared.length > 0) {
    logger.warn("Dropping columns not declared in schema", {
      schema: schema.name,
      columns: undeclared,
    });
  }

  const rejected = new Map<string, number>();
  const rows: Row[] = rawRows.map((raw) => {
    const row: Row = {};
    for (const field of schema.fields) {
      const source = mapping.get(field.name);
      const rawValue = source ? raw[source] : null;
      const value = coerceValue(rawValue, field);
      if (value === null && rawValue !== null && rawValue !== undefined) {
        const blank = typeof rawValue === "string" && NULL_TOKENS.has(rawValue.trim().toLowerCase());
        if (!blank) {
          rejected.set(field.name, (rejected.get(field.name) ?? 0) + 1);
        }
      }
      row[field.name] = value;
    }
    return row;
  });

  if (rejected.size > 0) {
    logger.warn("Unparseable values replaced with null", Object.fromEntries(rejected));
  }

  return RecordBatch.fromRows(
    schema.fields.map((f) => f.name),
    rows,
  );
}
