import { describe, it, expect } from 'vitest';
import { RecordBatch } from '../../../src/lib/batch/record-batch.js';
import { OutlierDetector, computeFences } from '../../../src/lib/profiler/outlier-detector.js';
import type { CellValue } from '../../../src/types/data-model.js';

function priceBatch(prices: CellValue[]): RecordBatch {
  return RecordBatch.fromRows(
    ['id', 'price'],
    prices.map((price, i) => ({ id: `P${i}`, price })),
  );
}

describe('computeFences()', () => {
  it('uses Q1 - 1.5 IQR and Q3 + 1.5 IQR', () => {
    expect(computeFences([10, 20, 30, 40, 50])).toEqual({
      q1: 20,
      q3: 40,
      iqr: 20,
      lower: -10,
      upper: 70,
    });
  });

  it('has no fences without values', () => {
    expect(computeFences([])).toBeNull();
  });
});

describe('OutlierDetector', () => {
  const detector = new OutlierDetector();

  it('flags nothing when every value lies inside the fences', () => {
    expect(detector.detect(priceBatch([10, 20, 30, 40, 50]), 'price').size).toBe(0);
  });

  it('does not flag a value sitting exactly on the upper fence', () => {
    // Q1 = 20, Q3 = 40 whatever the maximum is, so the fence stays at 70
    expect(detector.detect(priceBatch([10, 20, 30, 40, 70]), 'price').size).toBe(0);
  });

  it('flags a value one above Q3 + 1.5 IQR', () => {
    const batch = priceBatch([10, 20, 30, 40, 71]);

    expect(detector.detect(batch, 'price')).toEqual(new Set(['P4']));
  });

  it('flags a value below the lower fence', () => {
    // Sorted [-21, 10, 20, 30, 40]: Q1 = 10, Q3 = 30, lower fence -20
    const analysis = detector.analyze(priceBatch([10, -21, 20, 30, 40]), 'price');

    expect(analysis.rowIndexes).toEqual([1]);
    expect(analysis.recordIds).toEqual(['P1']);
  });

  it('gives the same result whatever the record order', () => {
    const forward = detector.detect(priceBatch([10, 20, 30, 40, 71]), 'price');
    const shuffled = RecordBatch.fromRows(
      ['id', 'price'],
      [
        { id: 'P4', price: 71 },
        { id: 'P2', price: 30 },
        { id: 'P0', price: 10 },
        { id: 'P3', price: 40 },
        { id: 'P1', price: 20 },
      ],
    );

    expect(detector.detect(shuffled, 'price')).toEqual(forward);
  });

  it('leaves nulls and non-numeric values out of the quartiles', () => {
    const analysis = detector.analyze(priceBatch([10, null, 20, 'n/a', 30, 40, 71]), 'price');

    expect(analysis.valuesConsidered).toBe(5);
    expect(analysis.fences).toMatchObject({ q1: 20, q3: 40 });
    expect(analysis.rowIndexes).toEqual([6]);
  });

  it('has no fences when the field has no numbers', () => {
    const analysis = detector.analyze(priceBatch([null, null]), 'price');

    expect(analysis.fences).toBeNull();
    expect(analysis.rowIndexes).toEqual([]);
    expect(detector.toFindings(priceBatch([null, null]), analysis)).toEqual([]);
  });

  it('turns flagged rows into advisory Outlier findings', () => {
    const batch = priceBatch([10, 20, 30, 40, 71]);
    const findings = detector.toFindings(batch, detector.analyze(batch, 'price'));

    expect(findings).toEqual([
      {
        kind: 'Outlier',
        severity: 'advisory',
        field: 'price',
        recordIds: ['P4'],
        rowIndexes: [4],
        message: 'price=71 outside IQR fences [-10, 70]',
      },
    ]);
  });

  it('accepts a custom multiplier', () => {
    const wide = new OutlierDetector(3);

    expect(wide.detect(priceBatch([10, 20, 30, 40, 71]), 'price').size).toBe(0);
  });
});
