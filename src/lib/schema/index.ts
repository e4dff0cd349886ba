/**
 * Schema module - declared record shape and load-time coercion
 */

export { DEFAULT_LISTING_SCHEMA, CRITICAL_FIELDS } from "./default-schema.js";
export {
  RECORD_SCHEMA_DEFINITION,
  loadRecordSchema,
  parseRecordSchema,
} from "./schema-loader.js";
export { coerceRows, coerceValue, resolveColumnMapping } from "./coerce.js";
export type { RawRow } from "./coerce.js";
