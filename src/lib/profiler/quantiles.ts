/**
 * Quantile helpers
 * Linear interpolation between closest ranks: position (n - 1) * q in the sorted values
 */

/**
 * Sort a copy of the values ascending
 */
export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Quantile of already sorted values
 *
 * @param sorted - Values in ascending order
 * @param q - Quantile between 0.0 and 1.0
 *
 * @example
 * quantileSorted([1, 2, 3, 4], 0.25) // 1.75
 */
export function quantileSorted(sorted: readonly number[], q: number): number {
  if (q < 0 || q > 1) {
    throw new Error("Quantile must be between 0.0 and 1.0");
  }
  if (sorted.length === 0) {
    throw new Error("Cannot calculate quantile of empty values");
  }

  const position = (sorted.length - 1) * q;
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const lower = sorted[lowerIndex] ?? 0;
  const upper = sorted[upperIndex] ?? lower;

  return lower + (upper - lower) * (position - lowerIndex);
}

/**
 * Quantile of unsorted values
 */
export function quantile(values: readonly number[], q: number): number {
  return quantileSorted(sortAscending(values), q);
}
