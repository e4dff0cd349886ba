/**
 * Pipeline orchestrator
 *
 * Sequences Extract → Validate → Enrich → Detect anomalies → Load over one
 * batch and folds every stage's findings and errors into a single
 * ProcessingReport. Collaborator failures are caught and classified; `run`
 * resolves with a Failed report instead of rejecting.
 */

import type { PipelineOptions } from "../../types/config.js";
import type { ProcessingReport, QualityFinding } from "../../types/data-model.js";
import { RecordBatch } from "../batch/record-batch.js";
import { deduplicate } from "../dedupe/deduplicator.js";
import { FileSink } from "../emitter/file-sink.js";
import type { Sink } from "../emitter/types.js";
import { Enricher } from "../enricher/enricher.js";
import { FileLoader } from "../loader/file-loader.js";
import type { Loader } from "../loader/types.js";
import { calculateBatchStats } from "../profiler/numeric-stats.js";
import { OutlierDetector } from "../profiler/outlier-detector.js";
import { countByKind, createFinding } from "../validator/findings.js";
import { QualityValidator } from "../validator/quality-validator.js";
import {
  EstateEtlError,
  ErrorCode,
  ExtractError,
  LoadError,
  toEstateEtlError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { resolvePipelineOptions } from "./options.js";
import type { PipelineOptionsInput } from "./options.js";
import { RunState } from "./run-state.js";

export interface PipelineCollaborators {
  loader?: Loader;
  sink?: Sink;
}

interface RunTotals {
  inputRecordCount: number;
  duplicatesRemoved: number;
  outliersRemoved: number;
}

export class PipelineOrchestrator {
  constructor(private readonly collaborators: PipelineCollaborators = {}) {}

  async run(
    inputPath: string,
    outputPath: string,
    input: PipelineOptionsInput,
  ): Promise<ProcessingReport> {
    const options = resolvePipelineOptions(input);
    const run = new RunState();
    const totals: RunTotals = { inputRecordCount: 0, duplicatesRemoved: 0, outliersRemoved: 0 };
    let batch = RecordBatch.empty();

    logger.info("Starting pipeline", { inputPath, outputPath });

    try {
      // Extract
      try {
        batch = await this.loaderFor(options).extract(inputPath);
      } catch (error) {
        const extractError =
          error instanceof ExtractError
            ? error
            : new ExtractError(
                error instanceof Error ? error.message : String(error),
                { inputPath },
                { cause: error },
              );
        return this.failed(run, extractError, batch, totals, inputPath, outputPath, options);
      }
      totals.inputRecordCount = batch.size;
      run.advance("Extracted", batch.size);

      // Validate
      const quality = new QualityValidator(options.validator).validate(batch);
      run.findings.push(...quality.findings);
      if (quality.findings.length > 0) {
        logger.warn("Quality findings detected", countByKind(quality.findings));
      }
      if (options.stopOnCritical && !quality.passed) {
        const gate = new EstateEtlError(
          ErrorCode.QUALITY_GATE_ERROR,
          `${quality.criticalCount} critical quality findings with stopOnCritical enabled`,
        );
        return this.failed(run, gate, batch, totals, inputPath, outputPath, options);
      }
      run.advance("Validated", batch.size);

      // Enrich
      batch = new Enricher(options).enrich(batch);
      run.advance("Enriched", batch.size);

      // Detect anomalies
      batch = this.checkAnomalies(batch, run.findings, totals, options);
      if (options.failOnAdvisory) {
        const advisory = run.findings.filter((f) => f.severity === "advisory").length;
        if (advisory > 0) {
          const gate = new EstateEtlError(
            ErrorCode.QUALITY_GATE_ERROR,
            `${advisory} advisory quality findings with failOnAdvisory enabled`,
          );
          return this.failed(run, gate, batch, totals, inputPath, outputPath, options);
        }
      }
      run.advance("AnomalyChecked", batch.size);

      if (options.revalidateOutput) {
        run.findings.push(...this.revalidate(batch, options));
      }

      // Load
      try {
        await this.sinkFor().load(batch, outputPath);
      } catch (error) {
        const loadError =
          error instanceof LoadError
            ? error
            : new LoadError(
                error instanceof Error ? error.message : String(error),
                { outputPath },
                { cause: error },
              );
        return this.failed(run, loadError, batch, totals, inputPath, outputPath, options);
      }
      run.advance("Loaded", batch.size);
      run.advance("Done", batch.size);

      logger.info("Pipeline completed", {
        inputRecords: totals.inputRecordCount,
        outputRecords: batch.size,
        findings: run.findings.length,
      });
      return buildReport(run, batch, totals, inputPath, outputPath, options);
    } catch (error) {
      // Anything unexpected inside a stage still ends as a Failed report
      return this.failed(
        run,
        toEstateEtlError(error),
        batch,
        totals,
        inputPath,
        outputPath,
        options,
      );
    }
  }

  private loaderFor(options: PipelineOptions): Loader {
    return this.collaborators.loader ?? new FileLoader(options.schema);
  }

  private sinkFor(): Sink {
    return this.collaborators.sink ?? new FileSink();
  }

  /**
   * Dedupe (when enabled) first so repeated rows do not weigh on the quartiles,
   * then flag or remove IQR outliers field by field
   */
  private checkAnomalies(
    batch: RecordBatch,
    findings: QualityFinding[],
    totals: RunTotals,
    options: PipelineOptions,
  ): RecordBatch {
    let current = batch;

    if (options.dedupe) {
      const result = deduplicate(current);
      current = result.batch;
      totals.duplicatesRemoved = result.removedCount;
    }

    const detector = new OutlierDetector();
    const flagged = new Set<number>();
    for (const field of options.outlierFields) {
      if (!current.hasColumn(field)) {
        logger.warn("Outlier field not present in batch, skipping", { field });
        continue;
      }
      const analysis = detector.analyze(current, field);
      findings.push(...detector.toFindings(current, analysis));
      analysis.rowIndexes.forEach((index) => flagged.add(index));
      logger.debug("Outlier analysis", {
        field,
        fences: analysis.fences,
        flagged: analysis.rowIndexes.length,
      });
    }

    if (flagged.size > 0) {
      logger.warn("Possible outliers detected", { records: flagged.size, policy: options.outlierPolicy });
    }

    if (options.outlierPolicy === "remove" && flagged.size > 0) {
      current = current.filter((_record, index) => !flagged.has(index));
      totals.outliersRemoved = flagged.size;
    }

    return current;
  }

  /**
   * Findings on the final batch, tagged so they read apart from the input checks
   */
  private revalidate(batch: RecordBatch, options: PipelineOptions): QualityFinding[] {
    const report = new QualityValidator(options.validator).validate(batch);
    return report.findings.map((finding) =>
      createFinding({
        kind: finding.kind,
        severity: finding.severity,
        field: finding.field,
        recordIds: [...finding.recordIds],
        rowIndexes: [...finding.rowIndexes],
        message: `output: ${finding.message}`,
      }),
    );
  }

  private failed(
    run: RunState,
    error: EstateEtlError,
    batch: RecordBatch,
    totals: RunTotals,
    inputPath: string,
    outputPath: string,
    options: PipelineOptions,
  ): ProcessingReport {
    logger.error("Pipeline failed", {
      state: run.state,
      code: error.code,
      message: error.message,
    });
    run.fail(error, batch.size);
    return buildReport(run, batch, totals, inputPath, outputPath, options);
  }
}

function buildReport(
  run: RunState,
  batch: RecordBatch,
  totals: RunTotals,
  inputPath: string,
  outputPath: string,
  options: PipelineOptions,
): ProcessingReport {
  const done = run.state === "Done";

  const report: ProcessingReport = {
    status: done ? "success" : "failed",
    state: done ? "Done" : "Failed",
    timestamp: options.referenceNow.toISOString(),
    inputPath,
    outputPath,
    inputRecordCount: totals.inputRecordCount,
    // Nothing is written on failure
    outputRecordCount: done ? batch.size : 0,
    columnCount: batch.columnCount,
    findings: Object.freeze([...run.findings]),
    fatalErrors: Object.freeze(run.fatalErrors.map((e) => Object.freeze({ ...e }))),
    transitions: Object.freeze(run.transitions.map((t) => Object.freeze({ ...t }))),
    duplicatesRemoved: totals.duplicatesRemoved,
    outliersRemoved: totals.outliersRemoved,
    statistics: done ? calculateBatchStats(batch) : {},
  };

  return Object.freeze(report);
}

/**
 * Run the pipeline once with file collaborators (or injected ones)
 */
export async function runPipeline(
  inputPath: string,
  outputPath: string,
  options: PipelineOptionsInput,
  collaborators: PipelineCollaborators = {},
): Promise<ProcessingReport> {
  return new PipelineOrchestrator(collaborators).run(inputPath, outputPath, options);
}
