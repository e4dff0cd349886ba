/**
 * Pipeline option defaults and resolution
 */

import type { PipelineOptions, ValidatorOptions } from "../../types/config.js";
import { DEFAULT_CATEGORY_OPTIONS } from "../enricher/enricher.js";
import { DEFAULT_LISTING_SCHEMA } from "../schema/default-schema.js";
import { resolveValidatorOptions } from "../validator/quality-validator.js";
import { ValidationError } from "../../utils/errors.js";

export const DEFAULT_OUTLIER_FIELDS = ["price", "area_m2", "price_per_m2"];

/**
 * Options accepted by a run: everything optional except the reference "now"
 */
export type PipelineOptionsInput = Partial<Omit<PipelineOptions, "validator" | "referenceNow">> & {
  referenceNow: Date;
  validator?: Partial<ValidatorOptions>;
};

export function resolvePipelineOptions(input: PipelineOptionsInput): PipelineOptions {
  if (Number.isNaN(input.referenceNow.getTime())) {
    throw new ValidationError("referenceNow must be a valid date");
  }

  return {
    stopOnCritical: input.stopOnCritical ?? false,
    outlierFields: input.outlierFields ?? DEFAULT_OUTLIER_FIELDS,
    dedupe: input.dedupe ?? true,
    referenceNow: input.referenceNow,
    outlierPolicy: input.outlierPolicy ?? "flag",
    failOnAdvisory: input.failOnAdvisory ?? false,
    revalidateOutput: input.revalidateOutput ?? false,
    category: input.category ?? DEFAULT_CATEGORY_OPTIONS,
    validator: resolveValidatorOptions(input.validator),
    schema: input.schema ?? DEFAULT_LISTING_SCHEMA,
  };
}
