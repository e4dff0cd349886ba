import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { RecordBatch } from '../../src/lib/batch/record-batch.js';
import type { Sink } from '../../src/lib/emitter/types.js';
import type { Loader } from '../../src/lib/loader/types.js';
import { PipelineOrchestrator, runPipeline } from '../../src/lib/pipeline/orchestrator.js';
import type { Row } from '../../src/types/data-model.js';

const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');
const listingsCsv = path.join(fixturesDir, 'listings.csv');
const referenceNow = new Date('2024-06-01T00:00:00Z');

/**
 * In-memory loader standing in for a source file
 */
class StaticLoader implements Loader {
  constructor(private readonly batch: RecordBatch) {}

  async extract(): Promise<RecordBatch> {
    return this.batch;
  }
}

/**
 * Sink that keeps what it was given instead of writing files
 */
class MemorySink implements Sink {
  written: RecordBatch | null = null;

  async load(batch: RecordBatch): Promise<void> {
    this.written = batch;
  }
}

function listings(prices: number[]): RecordBatch {
  const rows: Partial<Row>[] = prices.map((price, i) => ({
    id: `L${i + 1}`,
    property_type: 'Departamento',
    price,
    area_m2: 50,
    publication_date: '2024-05-01',
  }));
  return RecordBatch.fromRows(['id', 'property_type', 'price', 'area_m2', 'publication_date'], rows);
}

describe('Pipeline failures', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'estate-etl-fail-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('fails from Idle when the source file is missing', async () => {
    const input = path.join(dir, 'absent.csv');
    const output = path.join(dir, 'out.csv');

    const report = await runPipeline(input, output, { referenceNow });

    expect(report.state).toBe('Failed');
    expect(report.status).toBe('failed');
    expect(report.fatalErrors).toEqual([
      { state: 'Idle', code: 'EXTRACT_ERROR', message: `Source file not found: ${input}` },
    ]);
    expect(report.transitions).toEqual([{ from: 'Idle', to: 'Failed', recordCount: 0 }]);
    expect(report.outputRecordCount).toBe(0);
    await expect(fs.access(output)).rejects.toThrow();
  });

  it('stops before enrichment on critical findings when stopOnCritical is set', async () => {
    const output = path.join(dir, 'out.csv');

    const report = await runPipeline(listingsCsv, output, { referenceNow, stopOnCritical: true });

    expect(report.state).toBe('Failed');
    expect(report.fatalErrors).toEqual([
      {
        state: 'Extracted',
        code: 'QUALITY_GATE_ERROR',
        message: '2 critical quality findings with stopOnCritical enabled',
      },
    ]);
    expect(report.findings).toHaveLength(2);
    expect(report.statistics).toEqual({});
    await expect(fs.access(output)).rejects.toThrow();
  });

  it('classifies a sink failure as a load error', async () => {
    const failingSink: Sink = {
      load: async () => {
        throw new Error('disk full');
      },
    };

    const report = await new PipelineOrchestrator({
      loader: new StaticLoader(listings([100000, 110000, 120000])),
      sink: failingSink,
    }).run('memory', 'nowhere.csv', { referenceNow });

    expect(report.state).toBe('Failed');
    expect(report.fatalErrors).toEqual([
      { state: 'AnomalyChecked', code: 'LOAD_ERROR', message: 'disk full' },
    ]);
    expect(report.outputRecordCount).toBe(0);
    expect(report.transitions.at(-1)).toEqual({
      from: 'AnomalyChecked',
      to: 'Failed',
      recordCount: 3,
    });
  });

  it('classifies a loader failure as an extract error', async () => {
    const brokenLoader: Loader = {
      extract: async () => {
        throw new Error('permission denied');
      },
    };

    const report = await new PipelineOrchestrator({ loader: brokenLoader, sink: new MemorySink() }).run(
      'locked.csv',
      'out.csv',
      { referenceNow },
    );

    expect(report.fatalErrors).toEqual([
      { state: 'Idle', code: 'EXTRACT_ERROR', message: 'permission denied' },
    ]);
  });

  it('flags outliers without removing them by default', async () => {
    const sink = new MemorySink();
    const report = await new PipelineOrchestrator({
      loader: new StaticLoader(listings([100000, 110000, 120000, 130000, 900000])),
      sink,
    }).run('memory', 'out.csv', { referenceNow });

    expect(report.state).toBe('Done');
    expect(report.findings.map((f) => f.message)).toEqual([
      'price=900000 outside IQR fences [80000, 160000]',
      'price_per_m2=18000 outside IQR fences [1600, 3200]',
    ]);
    expect(report.outliersRemoved).toBe(0);
    expect(sink.written?.size).toBe(5);
  });

  it('drops flagged rows with the remove policy', async () => {
    const sink = new MemorySink();
    const report = await new PipelineOrchestrator({
      loader: new StaticLoader(listings([100000, 110000, 120000, 130000, 900000])),
      sink,
    }).run('memory', 'out.csv', { referenceNow, outlierPolicy: 'remove' });

    expect(report.outliersRemoved).toBe(1);
    expect(report.outputRecordCount).toBe(4);
    expect(sink.written?.values('id')).toEqual(['L1', 'L2', 'L3', 'L4']);
  });

  it('fails before load on advisory findings when failOnAdvisory is set', async () => {
    const sink = new MemorySink();
    const report = await new PipelineOrchestrator({
      loader: new StaticLoader(listings([100000, 110000, 120000, 130000, 900000])),
      sink,
    }).run('memory', 'out.csv', { referenceNow, failOnAdvisory: true });

    expect(report.state).toBe('Failed');
    expect(report.fatalErrors).toEqual([
      {
        state: 'Enriched',
        code: 'QUALITY_GATE_ERROR',
        message: '2 advisory quality findings with failOnAdvisory enabled',
      },
    ]);
    expect(sink.written).toBeNull();
  });

  it('skips outlier fields the batch does not have', async () => {
    const report = await new PipelineOrchestrator({
      loader: new StaticLoader(listings([100000, 110000])),
      sink: new MemorySink(),
    }).run('memory', 'out.csv', { referenceNow, outlierFields: ['bedrooms', 'price'] });

    expect(report.state).toBe('Done');
    expect(report.findings).toEqual([]);
  });

  it('rejects an invalid reference time before running', async () => {
    await expect(
      runPipeline(listingsCsv, path.join(dir, 'out.csv'), { referenceNow: new Date('nope') }),
    ).rejects.toThrow('referenceNow must be a valid date');
  });
});
