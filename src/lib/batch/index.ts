/**
 * Batch module - the in-memory record collection passed between stages
 */

export { RecordBatch } from "./record-batch.js";
