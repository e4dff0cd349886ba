/**
 * Data-quality validation for listing batches
 *
 * Runs the null, range, duplicate and consistency checks and aggregates
 * their findings. The batch is only read, never changed.
 */

import type { QualityFinding, QualityReport, RecordId, Row } from "../../types/data-model.js";
import type { ConsistencyBound, ValidatorOptions } from "../../types/config.js";
import type { RecordBatch } from "../batch/record-batch.js";
import { CRITICAL_FIELDS } from "../schema/default-schema.js";
import { createFinding, isCritical } from "./findings.js";
import { formatNumber, recordIdOf, toFiniteNumber } from "../../utils/values.js";
import { logger } from "../../utils/logger.js";

const RANGE_FIELDS = ["price", "area_m2"] as const;

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
  criticalFields: CRITICAL_FIELDS,
  priceCeiling: 1_000_000_000,
  areaCeiling: 100_000,
  consistencyBounds: {
    terreno: { min: 1, max: 20_000 },
  },
  defaultConsistencyBound: { min: 50, max: 50_000 },
};

/**
 * Merge partial options over the defaults (bounds maps are merged key by key)
 */
export function resolveValidatorOptions(options: Partial<ValidatorOptions> = {}): ValidatorOptions {
  const bounds: Record<string, ConsistencyBound> = {};
  for (const [type, bound] of Object.entries({
    ...DEFAULT_VALIDATOR_OPTIONS.consistencyBounds,
    ...options.consistencyBounds,
  })) {
    bounds[type.trim().toLowerCase()] = bound;
  }

  return {
    ...DEFAULT_VALIDATOR_OPTIONS,
    ...options,
    consistencyBounds: bounds,
  };
}

export class QualityValidator {
  private readonly options: ValidatorOptions;

  constructor(options: Partial<ValidatorOptions> = {}) {
    this.options = resolveValidatorOptions(options);
  }

  validate(batch: RecordBatch): QualityReport {
    const { records } = batch;

    const nullFindings: QualityFinding[] = [];
    const rangeFindings: QualityFinding[] = [];
    const consistencyFindings: QualityFinding[] = [];

    records.forEach((record, index) => {
      const nulls = this.checkNulls(record, index);
      nullFindings.push(...nulls);
      // Records missing a critical field skip the numeric checks
      if (nulls.length > 0) {
        return;
      }

      const range = this.checkRanges(record, index);
      rangeFindings.push(...range);
      if (range.some(isCritical)) {
        return;
      }

      const inconsistent = this.checkConsistency(record, index);
      if (inconsistent) {
        consistencyFindings.push(inconsistent);
      }
    });

    const findings = [
      ...nullFindings,
      ...rangeFindings,
      ...this.checkDuplicates(batch),
      ...consistencyFindings,
    ];
    const criticalCount = findings.filter(isCritical).length;

    const report: QualityReport = {
      findings,
      passed: criticalCount === 0,
      criticalCount,
      advisoryCount: findings.length - criticalCount,
      recordsChecked: records.length,
    };

    logger.debug("Quality validation finished", {
      records: report.recordsChecked,
      critical: report.criticalCount,
      advisory: report.advisoryCount,
    });

    return report;
  }

  /**
   * One NullCritical finding per null critical field
   */
  private checkNulls(record: Readonly<Row>, index: number): QualityFinding[] {
    const id = recordIdOf(record);
    return this.options.criticalFields
      .filter((field) => record[field] === null || record[field] === undefined)
      .map((field) =>
        createFinding({
          kind: "NullCritical",
          field,
          recordIds: id !== null ? [id] : [],
          rowIndexes: [index],
          message: `Critical field '${field}' is null at row ${index}`,
        }),
      );
  }

  /**
   * price and area_m2 must be finite and > 0; values above the ceilings are advisory
   */
  private checkRanges(record: Readonly<Row>, index: number): QualityFinding[] {
    const id = recordIdOf(record);
    const recordIds = id !== null ? [id] : [];
    const findings: QualityFinding[] = [];

    for (const field of RANGE_FIELDS) {
      const raw = record[field];
      if (raw === null || raw === undefined) continue;

      const value = toFiniteNumber(raw);
      const ceiling = field === "price" ? this.options.priceCeiling : this.options.areaCeiling;

      if (value === null) {
        findings.push(
          createFinding({
            kind: "OutOfRange",
            field,
            recordIds,
            rowIndexes: [index],
            message: `${field} is not a finite number at row ${index}`,
          }),
        );
      } else if (value <= 0) {
        findings.push(
          createFinding({
            kind: "OutOfRange",
            field,
            recordIds,
            rowIndexes: [index],
            message: `${field} must be greater than 0, got ${formatNumber(value)}`,
          }),
        );
      } else if (value > ceiling) {
        findings.push(
          createFinding({
            kind: "OutOfRange",
            severity: "advisory",
            field,
            recordIds,
            rowIndexes: [index],
            message: `${field} ${formatNumber(value)} exceeds plausibility ceiling ${formatNumber(ceiling)}`,
          }),
        );
      }
    }

    return findings;
  }

  /**
   * One Duplicate finding per id seen more than once, listing every occurrence
   */
  private checkDuplicates(batch: RecordBatch): QualityFinding[] {
    const groups = new Map<string, { id: RecordId; rowIndexes: number[] }>();

    batch.records.forEach((record, index) => {
      const id = recordIdOf(record);
      if (id === null) return;

      const key = String(id);
      const group = groups.get(key);
      if (group) {
        group.rowIndexes.push(index);
      } else {
        groups.set(key, { id, rowIndexes: [index] });
      }
    });

    const findings: QualityFinding[] = [];
    for (const { id, rowIndexes } of groups.values()) {
      if (rowIndexes.length < 2) continue;
      findings.push(
        createFinding({
          kind: "Duplicate",
          field: "id",
          recordIds: [id],
          rowIndexes,
          message: `id ${String(id)} occurs ${rowIndexes.length} times (rows ${rowIndexes.join(", ")})`,
        }),
      );
    }
    return findings;
  }

  /**
   * price / area_m2 must sit inside the bound of the record's property type
   */
  private checkConsistency(record: Readonly<Row>, index: number): QualityFinding | null {
    const price = toFiniteNumber(record.price);
    const area = toFiniteNumber(record.area_m2);
    const type = record.property_type;
    if (price === null || area === null || area <= 0 || typeof type !== "string") {
      return null;
    }

    const bound =
      this.options.consistencyBounds[type.trim().toLowerCase()] ??
      this.options.defaultConsistencyBound;
    const pricePerM2 = price / area;
    if (pricePerM2 >= bound.min && pricePerM2 <= bound.max) {
      return null;
    }

    const id = recordIdOf(record);
    return createFinding({
      kind: "Inconsistent",
      field: "price_per_m2",
      recordIds: id !== null ? [id] : [],
      rowIndexes: [index],
      message: `price per m2 ${formatNumber(pricePerM2)} outside [${formatNumber(bound.min)}, ${formatNumber(bound.max)}] for property type '${type}'`,
    });
  }
}
