/**
 * Profiler module - batch statistics and IQR outlier detection
 */

export * from "./types.js";
export * from "./quantiles.js";
export * from "./numeric-stats.js";
export * from "./outlier-detector.js";
