/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { SchemaObject } from "ajv";
import type { EstateEtlConfig } from "./types.js";
import { SchemaValidator, formatViolations } from "../../lib/validator/schema-validator.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const BOUND = {
  type: "object",
  required: ["min", "max"],
  additionalProperties: false,
  properties: {
    min: { type: "number" },
    max: { type: "number" },
  },
};

const VALIDATOR_SECTION = {
  type: "object",
  additionalProperties: false,
  properties: {
    criticalFields: { type: "array", items: { type: "string", minLength: 1 } },
    priceCeiling: { type: "number", exclusiveMinimum: 0 },
    areaCeiling: { type: "number", exclusiveMinimum: 0 },
    consistencyBounds: { type: "object", additionalProperties: BOUND },
    defaultConsistencyBound: BOUND,
  },
};

const CATEGORY_SECTION = {
  type: "object",
  additionalProperties: false,
  properties: {
    basis: { enum: ["price_per_m2", "price"] },
    thresholds: {
      oneOf: [
        { const: "tertiles" },
        { type: "array", items: { type: "number" }, minItems: 2, maxItems: 2 },
      ],
    },
  },
};

export const CONFIG_FILE_SCHEMA: SchemaObject = {
  type: "object",
  additionalProperties: false,
  properties: {
    run: {
      type: "object",
      additionalProperties: false,
      properties: {
        input: { type: "string", minLength: 1 },
        output: { type: "string", minLength: 1 },
        reportPath: { type: "string", minLength: 1 },
        schema: { type: "string", minLength: 1 },
        referenceNow: { type: "string", minLength: 1 },
        stopOnCritical: { type: "boolean" },
        dedupe: { type: "boolean" },
        outlierFields: { type: "array", items: { type: "string", minLength: 1 } },
        outlierPolicy: { enum: ["flag", "remove"] },
        failOnAdvisory: { type: "boolean" },
        revalidateOutput: { type: "boolean" },
        category: CATEGORY_SECTION,
        validator: VALIDATOR_SECTION,
      },
    },
    validate: {
      type: "object",
      additionalProperties: false,
      properties: {
        input: { type: "string", minLength: 1 },
        schema: { type: "string", minLength: 1 },
        reportPath: { type: "string", minLength: 1 },
        validator: VALIDATOR_SECTION,
      },
    },
    generate: {
      type: "object",
      additionalProperties: false,
      properties: {
        output: { type: "string", minLength: 1 },
        count: { type: "integer", minimum: 0 },
        seed: { type: ["string", "integer"] },
        referenceNow: { type: "string", minLength: 1 },
        nullRate: { type: "number", minimum: 0, maximum: 1 },
      },
    },
  },
};

const validator = new SchemaValidator<EstateEtlConfig>().compile(CONFIG_FILE_SCHEMA);

/**
 * Check an already parsed document against the config file schema
 */
export function parseConfigDocument(document: unknown, source = "<inline>"): EstateEtlConfig {
  // An empty YAML file parses to null
  const value = document ?? {};
  if (!validator.validate(value)) {
    const violations = validator.getErrors();
    throw new ConfigError(`Invalid config file ${source}: ${formatViolations(violations)}`, {
      source,
      violations,
    });
  }
  return value;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): EstateEtlConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = parseConfigDocument(document, filePath);
  logger.info("Configuration file parsed successfully", {
    hasRunConfig: !!config.run,
    hasValidateConfig: !!config.validate,
    hasGenerateConfig: !!config.generate,
  });

  return config;
}

/**
 * Validate required fields are present after merging
 */
export function requireFields<T extends object, K extends keyof T & string>(
  section: Partial<T>,
  requiredFields: K[],
  sectionName: string,
): asserts section is Partial<T> & Required<Pick<T, K>> {
  const missingFields = requiredFields.filter((field) => section[field] === undefined);

  if (missingFields.length > 0) {
    throw new ConfigError(
      `Missing required options for ${sectionName}: ${missingFields.join(", ")}`,
      { missingFields },
    );
  }
}
