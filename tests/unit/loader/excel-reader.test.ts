import { describe, it, expect } from 'vitest';
import { cellToRaw } from '../../../src/lib/loader/excel-reader.js';

describe('cellToRaw()', () => {
  it('passes plain values through', () => {
    const date = new Date('2024-03-15T00:00:00Z');

    expect(cellToRaw(42)).toBe(42);
    expect(cellToRaw('Casa')).toBe('Casa');
    expect(cellToRaw(date)).toBe(date);
    expect(cellToRaw(null)).toBeNull();
    expect(cellToRaw(undefined)).toBeNull();
  });

  it('uses the cached result of a formula', () => {
    expect(cellToRaw({ formula: 'B2*2', result: 300000, date1904: false })).toBe(300000);
  });

  it('joins rich text runs', () => {
    expect(cellToRaw({ richText: [{ text: 'Las ' }, { text: 'Condes' }] })).toBe('Las Condes');
  });

  it('reads the text of a hyperlink', () => {
    expect(cellToRaw({ text: 'listing', hyperlink: 'https://example.com/1' })).toBe('listing');
  });

  it('drops error cells', () => {
    expect(cellToRaw({ error: '#DIV/0!' })).toBeNull();
  });
});
