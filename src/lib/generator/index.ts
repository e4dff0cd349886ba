/**
 * Generator module - seeded sample listings
 */

export * from "./types.js";
export { generateSampleListings, DEFAULT_SAMPLE_OPTIONS } from "./sample-data.js";
