/**
 * Configuration types for estate-etl
 */

import type { RecordSchema } from "./data-model.js";

/**
 * Inclusive price-per-m² bound for one property type
 */
export interface ConsistencyBound {
  min: number;
  max: number;
}

/**
 * ValidatorOptions - Tunables of the quality validator
 */
export interface ValidatorOptions {
  criticalFields: string[];
  priceCeiling: number; // Prices above this are implausible (advisory)
  areaCeiling: number;
  consistencyBounds: Record<string, ConsistencyBound>; // Keyed by lower-cased property type
  defaultConsistencyBound: ConsistencyBound;
}

export type CategoryBasis = "price_per_m2" | "price";

/**
 * How price category thresholds are chosen: batch tertiles, or a fixed pair
 */
export type CategoryThresholds = "tertiles" | [number, number];

export interface CategoryOptions {
  basis: CategoryBasis;
  thresholds: CategoryThresholds;
}

/**
 * EnricherOptions - Derivation settings; referenceNow keeps age_days deterministic
 */
export interface EnricherOptions {
  referenceNow: Date;
  category: CategoryOptions;
}

export type OutlierPolicy = "flag" | "remove";

/**
 * PipelineOptions - Everything a single run needs besides the file paths
 */
export interface PipelineOptions {
  stopOnCritical: boolean;
  outlierFields: string[];
  dedupe: boolean;
  referenceNow: Date;
  outlierPolicy: OutlierPolicy;
  failOnAdvisory: boolean; // Halt before load on Inconsistent/Outlier findings
  revalidateOutput: boolean;
  category: CategoryOptions;
  validator: ValidatorOptions;
  schema: RecordSchema;
}
