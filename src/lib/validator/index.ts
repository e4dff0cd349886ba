/**
 * Validator module - data-quality checks and structural schema validation
 */

export {
  QualityValidator,
  DEFAULT_VALIDATOR_OPTIONS,
  resolveValidatorOptions,
} from "./quality-validator.js";
export { createFinding, isCritical, countByKind } from "./findings.js";
export type { FindingInput } from "./findings.js";
export { SchemaValidator, formatViolations } from "./schema-validator.js";
export type { SchemaViolation } from "./schema-validator.js";
