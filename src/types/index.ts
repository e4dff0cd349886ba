// Core re-exports for the estate-etl type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/loader/types.js";
export * from "../lib/emitter/types.js";
export * from "../lib/profiler/types.js";
export * from "../lib/generator/types.js";
