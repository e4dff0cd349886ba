/**
 * Price category bucketing
 * Economico below the first threshold, Medio up to the second, Premium from there on
 */

import type { CategoryThresholds } from "../../types/config.js";
import type { PriceCategory } from "../../types/data-model.js";
import { quantileSorted, sortAscending } from "../profiler/quantiles.js";

/**
 * Thresholds used by the original listing reports: raw price, 100k / 300k
 */
export const FIXED_PRICE_THRESHOLDS: [number, number] = [100_000, 300_000];

/**
 * Resolve the two category thresholds once for a whole batch
 *
 * @param values - Finite basis values of the batch (nulls already removed)
 * @returns The ordered pair, or null for tertiles of an empty batch
 */
export function computeCategoryThresholds(
  values: readonly number[],
  mode: CategoryThresholds,
): [number, number] | null {
  if (mode !== "tertiles") {
    const [a, b] = mode;
    return a <= b ? [a, b] : [b, a];
  }
  if (values.length === 0) {
    return null;
  }

  const sorted = sortAscending(values);
  return [quantileSorted(sorted, 1 / 3), quantileSorted(sorted, 2 / 3)];
}

export function categorize(
  value: number | null,
  thresholds: readonly [number, number] | null,
): PriceCategory | null {
  if (value === null || thresholds === null) {
    return null;
  }
  const [lower, upper] = thresholds;
  if (value < lower) return "Economico";
  if (value < upper) return "Medio";
  return "Premium";
}
