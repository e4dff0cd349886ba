/**
 * Loader module - source readers and the schema-aware file loader
 */

export * from "./types.js";
export { FileLoader, detectSourceFormat } from "./file-loader.js";
export { parseCsvTable } from "./csv-reader.js";
export { readXlsxTable, cellToRaw } from "./excel-reader.js";
export { readJsonTable, readNdjsonTable } from "./json-reader.js";
