/**
 * Dedupe module - keep-first deduplication by id
 */

export { deduplicate } from "./deduplicator.js";
export type { DeduplicationResult } from "./deduplicator.js";
