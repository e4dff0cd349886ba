/**
 * Id-based deduplication
 * Within each group of records sharing an id, the first in input order is kept.
 * Records without an id are never merged.
 */

import type { RecordId } from "../../types/data-model.js";
import type { RecordBatch } from "../batch/record-batch.js";
import { recordIdOf } from "../../utils/values.js";
import { logger } from "../../utils/logger.js";

export interface DeduplicationResult {
  batch: RecordBatch;
  removedCount: number;
  removedIds: RecordId[]; // One entry per dropped record
}

export function deduplicate(batch: RecordBatch): DeduplicationResult {
  const seen = new Set<string>();
  const removedIds: RecordId[] = [];

  const kept = batch.filter((record) => {
    const id = recordIdOf(record);
    if (id === null) {
      return true;
    }
    const key = String(id);
    if (seen.has(key)) {
      removedIds.push(id);
      return false;
    }
    seen.add(key);
    return true;
  });

  if (removedIds.length > 0) {
    logger.info("Duplicate records removed", {
      removed: removedIds.length,
      remaining: kept.size,
    });
  }

  return { batch: kept, removedCount: removedIds.length, removedIds };
}
