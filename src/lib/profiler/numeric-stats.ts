/**
 * Numeric column statistics
 * Descriptive summary (count, mean, std, min, quartiles, max) for the processing report
 */

import type { ColumnStats } from "../../types/data-model.js";
import type { RecordBatch } from "../batch/record-batch.js";
import { quantileSorted, sortAscending } from "./quantiles.js";

/**
 * Calculate mean of values
 */
function calculateMean(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Sample standard deviation; undefined below two values
 */
function calculateStdDev(values: readonly number[], mean: number): number | null {
  if (values.length < 2) {
    return null;
  }

  let sumSquaredDiff = 0;
  for (const value of values) {
    sumSquaredDiff += Math.pow(value - mean, 2);
  }

  return Math.sqrt(sumSquaredDiff / (values.length - 1));
}

/**
 * Summarize a non-empty list of numbers
 */
export function calculateColumnStats(values: readonly number[]): ColumnStats {
  if (values.length === 0) {
    throw new Error("Cannot calculate stats for empty values");
  }

  const sorted = sortAscending(values);
  const mean = calculateMean(sorted);

  return {
    count: sorted.length,
    mean,
    std: calculateStdDev(sorted, mean),
    min: sorted[0] ?? 0,
    p25: quantileSorted(sorted, 0.25),
    p50: quantileSorted(sorted, 0.5),
    p75: quantileSorted(sorted, 0.75),
    max: sorted[sorted.length - 1] ?? 0,
  };
}

/**
 * Extract the finite numeric values of every numeric column
 * A column is numeric when it has at least one value and every non-null value is a finite number
 */
export function extractNumericColumns(batch: RecordBatch): Map<string, number[]> {
  const numericValues = new Map<string, number[]>();

  for (const column of batch.columns) {
    const values: number[] = [];
    let numeric = true;

    for (const value of batch.values(column)) {
      if (value === null) continue;
      if (typeof value !== "number" || !Number.isFinite(value)) {
        numeric = false;
        break;
      }
      values.push(value);
    }

    if (numeric && values.length > 0) {
      numericValues.set(column, values);
    }
  }

  return numericValues;
}

/**
 * Calculate statistics for all numeric columns, keyed by column in batch order
 */
export function calculateBatchStats(batch: RecordBatch): Record<string, ColumnStats> {
  const stats: Record<string, ColumnStats> = {};

  for (const [column, values] of extractNumericColumns(batch)) {
    stats[column] = calculateColumnStats(values);
  }

  return stats;
}
