/**
 * Emitter module - sinks and record writers for processed batches
 */
export * from "./types.js";
export { FileSink, detectOutputFormat } from "./file-sink.js";
export { serializeCsv, DEFAULT_CSV_OPTIONS } from "./csv-writer.js";
export * from "./ndjson-writer.js";
export * from "./json-writer.js";
export { projectRow } from "./project.js";
