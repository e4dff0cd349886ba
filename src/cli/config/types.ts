/**
 * CLI configuration types
 */

import type {
  CategoryBasis,
  CategoryThresholds,
  ConsistencyBound,
  OutlierPolicy,
} from "../../types/config.js";

/**
 * Validator tunables as they appear in a config file
 */
export interface ValidatorConfig {
  criticalFields?: string[];
  priceCeiling?: number;
  areaCeiling?: number;
  consistencyBounds?: Record<string, ConsistencyBound>;
  defaultConsistencyBound?: ConsistencyBound;
}

export interface CategoryConfig {
  basis?: CategoryBasis;
  thresholds?: CategoryThresholds;
}

/**
 * Run command configuration
 */
export interface RunConfig {
  input: string;
  output: string;
  reportPath?: string;
  schema?: string; // Path to a record schema file
  referenceNow?: string; // ISO-8601; defaults to the current time
  stopOnCritical: boolean;
  dedupe: boolean;
  outlierFields?: string[];
  outlierPolicy: OutlierPolicy;
  failOnAdvisory: boolean;
  revalidateOutput: boolean;
  category?: CategoryConfig;
  validator?: ValidatorConfig;
}

/**
 * Validate command configuration (quality report only, nothing written)
 */
export interface ValidateConfig {
  input: string;
  schema?: string;
  reportPath?: string;
  validator?: ValidatorConfig;
}

/**
 * Generate command configuration
 */
export interface GenerateConfig {
  output: string;
  count: number;
  seed?: string | number;
  referenceNow?: string;
  nullRate: number;
}

/**
 * Complete configuration file structure
 */
export interface EstateEtlConfig {
  run?: Partial<RunConfig>;
  validate?: Partial<ValidateConfig>;
  generate?: Partial<GenerateConfig>;
}

/**
 * CLI command options (from commander)
 */
export interface RunCommandOptions {
  input?: string;
  output?: string;
  reportPath?: string;
  schema?: string;
  referenceNow?: string;
  stopOnCritical?: boolean;
  dedupe?: boolean;
  outlierFields?: string; // Comma-separated
  outlierPolicy?: string;
  failOnAdvisory?: boolean;
  revalidateOutput?: boolean;
  categoryBasis?: string;
  categoryThresholds?: string; // "tertiles" or "low,high"
  config?: string;
}

export interface ValidateCommandOptions {
  input?: string;
  schema?: string;
  reportPath?: string;
  config?: string;
}

export interface GenerateCommandOptions {
  output?: string;
  count?: number;
  seed?: string;
  referenceNow?: string;
  nullRate?: number;
  config?: string;
}
