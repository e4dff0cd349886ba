import { describe, it, expect } from 'vitest';
import { categorize, computeCategoryThresholds } from '../../../src/lib/enricher/price-category.js';

describe('computeCategoryThresholds()', () => {
  it('orders a fixed pair', () => {
    expect(computeCategoryThresholds([], [4000, 2000])).toEqual([2000, 4000]);
  });

  it('has no tertiles for an empty batch', () => {
    expect(computeCategoryThresholds([], 'tertiles')).toBeNull();
  });

  it('takes tertiles by linear interpolation', () => {
    expect(computeCategoryThresholds([30, 10, 20, 40], 'tertiles')).toEqual([20, 30]);
  });
});

describe('categorize()', () => {
  it('puts values on a threshold in the upper bucket', () => {
    expect(categorize(1999.99, [2000, 4000])).toBe('Economico');
    expect(categorize(2000, [2000, 4000])).toBe('Medio');
    expect(categorize(3000, [2000, 4000])).toBe('Medio');
    expect(categorize(4000, [2000, 4000])).toBe('Premium');
  });

  it('returns null without a value or thresholds', () => {
    expect(categorize(null, [2000, 4000])).toBeNull();
    expect(categorize(3000, null)).toBeNull();
  });
});
