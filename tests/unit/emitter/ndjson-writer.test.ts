/**
 * NDJSON Writer Tests
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { createNDJSONWriter } from '../../../src/lib/emitter/ndjson-writer.js';
import type { Row } from '../../../src/types/data-model.js';

async function collect(rows: Row[], columns: string[]): Promise<string[]> {
  const objectStream = Readable.from(rows, { objectMode: true });
  const ndjsonWriter = createNDJSONWriter(columns);

  const chunks: string[] = [];

  // Collect output chunks
  ndjsonWriter.on('data', (chunk) => {
    chunks.push(String(chunk));
  });

  await new Promise<void>((resolve, reject) => {
    ndjsonWriter.on('end', resolve);
    ndjsonWriter.on('error', reject);
    objectStream.pipe(ndjsonWriter);
  });

  return chunks;
}

describe('NDJSONWriter', () => {
  it('should convert a record stream to NDJSON lines', async () => {
    const chunks = await collect(
      [
        { id: 'A', price: 100 },
        { id: 'B', price: 200 },
        { id: 'C', price: null },
      ],
      ['id', 'price'],
    );

    expect(chunks).toEqual([
      '{"id":"A","price":100}\n',
      '{"id":"B","price":200}\n',
      '{"id":"C","price":null}\n',
    ]);
  });

  it('should handle empty stream', async () => {
    expect(await collect([], ['id'])).toHaveLength(0);
  });

  it('should follow the given column order', async () => {
    const chunks = await collect([{ b: 2, a: 1, ignored: true }], ['a', 'b']);

    expect(chunks).toEqual(['{"a":1,"b":2}\n']);
  });
});
