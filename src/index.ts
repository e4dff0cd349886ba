/**
 * estate-etl: Data-quality pipeline for real-estate listing files
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/batch/index.js";
export * from "./lib/schema/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/enricher/index.js";
export * from "./lib/profiler/index.js";
export * from "./lib/dedupe/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/pipeline/index.js";
export * from "./lib/reporter/index.js";
export * from "./lib/generator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
