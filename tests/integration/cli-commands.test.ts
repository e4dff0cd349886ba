import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { executeGenerate } from '../../src/cli/commands/generate.js';
import { executeRun } from '../../src/cli/commands/run.js';
import { executeValidate } from '../../src/cli/commands/validate.js';
import { mergeRunConfig } from '../../src/cli/config/resolve.js';

const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');
const listingsCsv = path.join(fixturesDir, 'listings.csv');

describe('CLI commands', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'estate-etl-cli-'));
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('generates a sample file and runs the pipeline over it', async () => {
    const sample = path.join(dir, 'sample.ndjson');
    const output = path.join(dir, 'clean.csv');
    const reportPath = path.join(dir, 'report.json');

    const generated = await executeGenerate({
      output: sample,
      count: 10,
      seed: 7,
      referenceNow: '2024-06-01T00:00:00Z',
      nullRate: 0.2,
    });

    expect(generated).toEqual({
      status: 'success',
      phase: 'generation',
      output: { path: sample, records: 10, seed: 7 },
    });
    const lines = (await fs.readFile(sample, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(10);
    const rows: unknown[] = lines.map((line) => JSON.parse(line));
    expect(rows.filter((row) => typeof row === 'object' && row !== null && 'description' in row && row.description === null)).toHaveLength(2);

    const exitCode = await executeRun(
      mergeRunConfig({
        input: sample,
        output,
        reportPath,
        referenceNow: '2024-06-01T00:00:00Z',
      }),
    );

    expect(exitCode).toBe(0);
    const report: unknown = JSON.parse(await fs.readFile(reportPath, 'utf8'));
    expect(report).toMatchObject({ status: 'success', state: 'Done', inputRecordCount: 10 });
    expect((await fs.readFile(output, 'utf8')).startsWith('\uFEFFid,property_type,')).toBe(true);
  });

  it('exits 1 when the critical quality gate trips', async () => {
    const exitCode = await executeRun(
      mergeRunConfig({
        input: listingsCsv,
        output: path.join(dir, 'out.csv'),
        referenceNow: '2024-06-01T00:00:00Z',
        stopOnCritical: true,
      }),
    );

    expect(exitCode).toBe(1);
  });

  it('exits 4 when the input file is missing', async () => {
    const exitCode = await executeRun(
      mergeRunConfig({
        input: path.join(dir, 'absent.csv'),
        output: path.join(dir, 'out.csv'),
        referenceNow: '2024-06-01T00:00:00Z',
      }),
    );

    expect(exitCode).toBe(4);
  });

  it('prints the report summary to stderr and the report to stdout', async () => {
    await executeRun(
      mergeRunConfig({
        input: listingsCsv,
        output: path.join(dir, 'out.csv'),
        referenceNow: '2024-06-01T00:00:00Z',
      }),
    );

    expect(process.stderr.write).toHaveBeenCalledWith(expect.stringContaining('PROCESSING REPORT'));
    expect(process.stdout.write).toHaveBeenCalledTimes(1);
    expect(process.stdout.write).toHaveBeenCalledWith(expect.stringContaining('"state": "Done"'));
  });

  it('validates without writing output and reports the findings', async () => {
    const reportPath = path.join(dir, 'quality.json');

    const { report, exitCode } = await executeValidate({ input: listingsCsv, reportPath });

    expect(exitCode).toBe(1);
    expect(report.passed).toBe(false);
    expect(report.recordsChecked).toBe(5);
    expect(report.criticalCount).toBe(2);
    expect(report.advisoryCount).toBe(0);
    expect(report.findings.map((f) => f.kind)).toEqual(['OutOfRange', 'Duplicate']);
    expect(await fs.readdir(dir)).toEqual(['quality.json']);
    const written: unknown = JSON.parse(await fs.readFile(reportPath, 'utf8'));
    expect(written).toMatchObject({ passed: false, criticalCount: 2 });
  });

  it('passes a clean file with exit code 0', async () => {
    const input = path.join(dir, 'clean.json');
    await fs.writeFile(
      input,
      JSON.stringify([
        { id: 'A1', property_type: 'Casa', price: 120000, area_m2: 60, publication_date: '2024-01-01' },
      ]),
    );

    const { report, exitCode } = await executeValidate({ input });

    expect(exitCode).toBe(0);
    expect(report.findings).toEqual([]);
  });
});
