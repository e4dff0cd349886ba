/**
 * JSON Array Writer Tests
 * Verifies JSON array format output
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { createJSONWriter } from '../../../src/lib/emitter/json-writer.js';
import type { Row } from '../../../src/types/data-model.js';

async function collect(rows: Row[], columns: string[]): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of Readable.from(rows).pipe(createJSONWriter(columns))) {
    chunks.push(String(chunk));
  }
  return chunks.join('');
}

describe('JSON Array Writer', () => {
  it('should convert a record stream to an indented JSON array', async () => {
    const output = await collect(
      [
        { id: 'A', price: 100 },
        { id: 'B', price: null },
      ],
      ['id', 'price'],
    );

    expect(output).toBe('[\n  {"id":"A","price":100},\n  {"id":"B","price":null}\n]\n');
    expect(JSON.parse(output)).toEqual([
      { id: 'A', price: 100 },
      { id: 'B', price: null },
    ]);
  });

  it('should handle empty stream', async () => {
    const output = await collect([], ['id']);

    expect(output).toBe('[]\n');
    expect(JSON.parse(output)).toEqual([]);
  });

  it('should handle single record', async () => {
    const output = await collect([{ id: 'A' }], ['id']);

    expect(output).toBe('[\n  {"id":"A"}\n]\n');
  });

  it('should write keys in column order and fill missing ones with null', async () => {
    const output = await collect([{ price: 5, id: 'A' }], ['id', 'price', 'area_m2']);

    expect(output).toBe('[\n  {"id":"A","price":5,"area_m2":null}\n]\n');
  });
});
