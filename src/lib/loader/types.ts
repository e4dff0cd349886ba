/**
 * Loader module types
 */

import type { RecordBatch } from "../batch/record-batch.js";
import type { RawRow } from "../schema/coerce.js";

export type SourceFormat = "csv" | "xlsx" | "json" | "ndjson";

/**
 * Rows as read from a source file, before schema coercion
 */
export interface RawTable {
  headers: string[];
  rows: RawRow[];
}

/**
 * Extract collaborator; rejects with ExtractError
 */
export interface Loader {
  extract(sourcePath: string): Promise<RecordBatch>;
}
