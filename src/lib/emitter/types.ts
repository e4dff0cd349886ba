/**
 * Emitter module types
 */

import type { RecordBatch } from "../batch/record-batch.js";

export type OutputFormat = "csv" | "json" | "ndjson";

/**
 * Load collaborator; rejects with LoadError and leaves the destination untouched on failure
 */
export interface Sink {
  load(batch: RecordBatch, destinationPath: string): Promise<void>;
}

export interface CsvWriterOptions {
  bom: boolean; // Prefix a UTF-8 byte order mark for spreadsheet tools
  newline: string;
}
