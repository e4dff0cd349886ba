/**
 * Merge CLI options over config file sections over defaults
 */

import type { CategoryOptions, CategoryThresholds, OutlierPolicy } from "../../types/config.js";
import type { RecordSchema } from "../../types/data-model.js";
import type { PipelineOptionsInput } from "../../lib/pipeline/options.js";
import { DEFAULT_CATEGORY_OPTIONS } from "../../lib/enricher/enricher.js";
import { DEFAULT_SAMPLE_OPTIONS } from "../../lib/generator/sample-data.js";
import { ConfigError } from "../../utils/errors.js";
import { requireFields } from "./parser.js";
import type {
  GenerateCommandOptions,
  GenerateConfig,
  RunCommandOptions,
  RunConfig,
  ValidateCommandOptions,
  ValidateConfig,
} from "./types.js";

/**
 * A config whose required keys may still be missing before the final check
 */
type Unchecked<T, K extends keyof T> = Omit<T, K> & Partial<Pick<T, K>>;

function isOutlierPolicy(value: string): value is OutlierPolicy {
  return value === "flag" || value === "remove";
}

/**
 * ISO-8601 reference time; absent means the current time
 */
export function parseReferenceNow(value: string | undefined): Date {
  if (value === undefined) {
    return new Date();
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigError(`Invalid reference date: ${value}`, { referenceNow: value });
  }
  return date;
}

/**
 * "tertiles" or a comma-separated "low,high" pair
 */
export function parseThresholds(value: string): CategoryThresholds {
  if (value.trim().toLowerCase() === "tertiles") {
    return "tertiles";
  }
  const parts = value.split(",").map((p) => Number(p.trim()));
  const [low, high] = parts;
  if (parts.length !== 2 || low === undefined || high === undefined || !parts.every(Number.isFinite)) {
    throw new ConfigError(`Invalid category thresholds: ${value}. Use "tertiles" or "low,high"`);
  }
  return [low, high];
}

export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseOutlierPolicy(value: string | undefined): OutlierPolicy | undefined {
  if (value === undefined) return undefined;
  if (!isOutlierPolicy(value)) {
    throw new ConfigError(`Invalid outlier policy: ${value}. Must be flag or remove`);
  }
  return value;
}

function parseCategoryBasis(value: string | undefined): CategoryOptions["basis"] | undefined {
  if (value === undefined) return undefined;
  if (value !== "price" && value !== "price_per_m2") {
    throw new ConfigError(`Invalid category basis: ${value}. Must be price_per_m2 or price`);
  }
  return value;
}

export function mergeRunConfig(
  options: RunCommandOptions,
  configFile: Partial<RunConfig> = {},
): RunConfig {
  const thresholds =
    options.categoryThresholds !== undefined
      ? parseThresholds(options.categoryThresholds)
      : configFile.category?.thresholds;

  const merged: Unchecked<RunConfig, "input" | "output"> = {
    input: options.input ?? configFile.input,
    output: options.output ?? configFile.output,
    reportPath: options.reportPath ?? configFile.reportPath,
    schema: options.schema ?? configFile.schema,
    referenceNow: options.referenceNow ?? configFile.referenceNow,
    stopOnCritical: options.stopOnCritical ?? configFile.stopOnCritical ?? false,
    dedupe: options.dedupe ?? configFile.dedupe ?? true,
    outlierFields: parseList(options.outlierFields) ?? configFile.outlierFields,
    outlierPolicy: parseOutlierPolicy(options.outlierPolicy) ?? configFile.outlierPolicy ?? "flag",
    failOnAdvisory: options.failOnAdvisory ?? configFile.failOnAdvisory ?? false,
    revalidateOutput: options.revalidateOutput ?? configFile.revalidateOutput ?? false,
    category: {
      basis: parseCategoryBasis(options.categoryBasis) ?? configFile.category?.basis,
      thresholds,
    },
    validator: configFile.validator,
  };

  requireFields<RunConfig, "input" | "output">(merged, ["input", "output"], "run");
  return merged;
}

/**
 * Pipeline options for a merged run config and an already loaded schema
 */
export function toPipelineOptions(config: RunConfig, schema: RecordSchema): PipelineOptionsInput {
  return {
    referenceNow: parseReferenceNow(config.referenceNow),
    stopOnCritical: config.stopOnCritical,
    dedupe: config.dedupe,
    outlierFields: config.outlierFields,
    outlierPolicy: config.outlierPolicy,
    failOnAdvisory: config.failOnAdvisory,
    revalidateOutput: config.revalidateOutput,
    category: {
      basis: config.category?.basis ?? DEFAULT_CATEGORY_OPTIONS.basis,
      thresholds: config.category?.thresholds ?? DEFAULT_CATEGORY_OPTIONS.thresholds,
    },
    validator: config.validator,
    schema,
  };
}

export function mergeValidateConfig(
  options: ValidateCommandOptions,
  configFile: Partial<ValidateConfig> = {},
): ValidateConfig {
  const merged: Unchecked<ValidateConfig, "input"> = {
    input: options.input ?? configFile.input,
    schema: options.schema ?? configFile.schema,
    reportPath: options.reportPath ?? configFile.reportPath,
    validator: configFile.validator,
  };

  requireFields<ValidateConfig, "input">(merged, ["input"], "validate");
  return merged;
}

export function mergeGenerateConfig(
  options: GenerateCommandOptions,
  configFile: Partial<GenerateConfig> = {},
): GenerateConfig {
  const merged: Unchecked<GenerateConfig, "output"> = {
    output: options.output ?? configFile.output,
    count: options.count ?? configFile.count ?? DEFAULT_SAMPLE_OPTIONS.count,
    seed: options.seed ?? configFile.seed,
    referenceNow: options.referenceNow ?? configFile.referenceNow,
    nullRate: options.nullRate ?? configFile.nullRate ?? DEFAULT_SAMPLE_OPTIONS.nullRate,
  };

  requireFields<GenerateConfig, "output">(merged, ["output"], "generate");
  if (!Number.isInteger(merged.count) || merged.count < 0) {
    throw new ConfigError(`count must be a non-negative integer, got ${merged.count}`);
  }
  if (!(merged.nullRate >= 0 && merged.nullRate <= 1)) {
    throw new ConfigError(`nullRate must be between 0.0 and 1.0, got ${merged.nullRate}`);
  }
  return merged;
}
