/**
 * Listing enrichment
 *
 * Adds price_per_m2, price_category, publication_month, publication_year,
 * age_days and price_area_ratio. Enrichment never drops a record: a value that
 * cannot be derived is stored as null, never as 0 or a sentinel.
 */

import { DERIVED_COLUMNS } from "../../types/data-model.js";
import type { Row } from "../../types/data-model.js";
import type { CategoryOptions, EnricherOptions } from "../../types/config.js";
import type { RecordBatch } from "../batch/record-batch.js";
import { categorize, computeCategoryThresholds } from "./price-category.js";
import { daysBetween, parseDateValue, safeDivide, toFiniteNumber } from "../../utils/values.js";
import { logger } from "../../utils/logger.js";

export const DEFAULT_CATEGORY_OPTIONS: CategoryOptions = {
  basis: "price_per_m2",
  thresholds: "tertiles",
};

/**
 * price / area_m2, null unless area is a positive number
 */
export function pricePerM2(record: Readonly<Row>): number | null {
  const area = toFiniteNumber(record.area_m2);
  if (area === null || area <= 0) {
    return null;
  }
  return safeDivide(record.price, area);
}

export class Enricher {
  private readonly referenceNow: Date;
  private readonly category: CategoryOptions;

  constructor(options: Pick<EnricherOptions, "referenceNow"> & Partial<EnricherOptions>) {
    this.referenceNow = options.referenceNow;
    this.category = options.category ?? DEFAULT_CATEGORY_OPTIONS;
  }

  /**
   * Category thresholds for this batch, computed from the configured basis
   */
  computeThresholds(batch: RecordBatch): [number, number] | null {
    const basis = batch.records
      .map((record) => this.basisValue(record))
      .filter((value): value is number => value !== null);
    return computeCategoryThresholds(basis, this.category.thresholds);
  }

  enrich(batch: RecordBatch): RecordBatch {
    const thresholds = this.computeThresholds(batch);
    logger.debug("Price category thresholds", {
      basis: this.category.basis,
      mode: this.category.thresholds === "tertiles" ? "tertiles" : "fixed",
      thresholds,
    });

    const enriched = batch.withColumns(DERIVED_COLUMNS, (record) => {
      const perM2 = pricePerM2(record);
      const published = parseDateValue(record.publication_date);

      return {
        price_per_m2: perM2,
        price_category: categorize(this.basisValue(record), thresholds),
        publication_month: published ? published.getUTCMonth() + 1 : null,
        publication_year: published ? published.getUTCFullYear() : null,
        age_days: published ? daysBetween(published, this.referenceNow) : null,
        price_area_ratio: perM2,
      };
    });

    logger.info("Enrichment completed", {
      records: enriched.size,
      columns: enriched.columnCount,
    });

    return enriched;
  }

  private basisValue(record: Readonly<Row>): number | null {
    return this.category.basis === "price"
      ? toFiniteNumber(record.price)
      : pricePerM2(record);
  }
}
