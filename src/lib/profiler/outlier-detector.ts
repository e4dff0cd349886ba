/**
 * IQR outlier detection
 *
 * Fences are Q1 - k*IQR and Q3 + k*IQR (k = 1.5); a value is flagged only when it
 * lies strictly beyond a fence. Nulls and non-numeric cells are left out of the
 * quartiles and never flagged. The result does not depend on record order.
 */

import type { QualityFinding, RecordId } from "../../types/data-model.js";
import type { RecordBatch } from "../batch/record-batch.js";
import { createFinding } from "../validator/findings.js";
import { formatNumber, recordIdOf, toFiniteNumber } from "../../utils/values.js";
import { quantileSorted, sortAscending } from "./quantiles.js";
import type { OutlierAnalysis, OutlierFences } from "./types.js";

export const DEFAULT_IQR_MULTIPLIER = 1.5;

/**
 * Compute IQR fences for a set of values, or null when there are none
 */
export function computeFences(
  values: readonly number[],
  multiplier = DEFAULT_IQR_MULTIPLIER,
): OutlierFences | null {
  if (values.length === 0) {
    return null;
  }

  const sorted = sortAscending(values);
  const q1 = quantileSorted(sorted, 0.25);
  const q3 = quantileSorted(sorted, 0.75);
  const iqr = q3 - q1;

  return {
    q1,
    q3,
    iqr,
    lower: q1 - multiplier * iqr,
    upper: q3 + multiplier * iqr,
  };
}

export class OutlierDetector {
  constructor(private readonly multiplier = DEFAULT_IQR_MULTIPLIER) {}

  /**
   * Fences and flagged rows for one field
   */
  analyze(batch: RecordBatch, field: string): OutlierAnalysis {
    const present: { index: number; value: number }[] = [];
    batch.records.forEach((record, index) => {
      const value = toFiniteNumber(record[field]);
      if (value !== null) {
        present.push({ index, value });
      }
    });

    const fences = computeFences(
      present.map((p) => p.value),
      this.multiplier,
    );

    const rowIndexes: number[] = [];
    const recordIds: RecordId[] = [];
    if (fences) {
      for (const { index, value } of present) {
        if (value < fences.lower || value > fences.upper) {
          rowIndexes.push(index);
          const record = batch.records[index];
          const id = record ? recordIdOf(record) : null;
          if (id !== null) {
            recordIds.push(id);
          }
        }
      }
    }

    return {
      field,
      fences,
      valuesConsidered: present.length,
      rowIndexes,
      recordIds,
    };
  }

  /**
   * Ids of the records whose value of `field` is an outlier
   */
  detect(batch: RecordBatch, field: string): Set<RecordId> {
    return new Set(this.analyze(batch, field).recordIds);
  }

  /**
   * One advisory Outlier finding per flagged row
   */
  toFindings(batch: RecordBatch, analysis: OutlierAnalysis): QualityFinding[] {
    const { fences, field } = analysis;
    if (!fences) {
      return [];
    }

    return analysis.rowIndexes.map((index) => {
      const record = batch.records[index];
      const id = record ? recordIdOf(record) : null;
      const value = record ? toFiniteNumber(record[field]) : null;
      return createFinding({
        kind: "Outlier",
        field,
        recordIds: id !== null ? [id] : [],
        rowIndexes: [index],
        message: `${field}=${value !== null ? formatNumber(value) : "null"} outside IQR fences [${formatNumber(fences.lower)}, ${formatNumber(fences.upper)}]`,
      });
    });
  }
}
