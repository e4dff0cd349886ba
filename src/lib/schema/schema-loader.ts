/**
 * Record schema loading
 * Schemas are JSON or YAML documents checked against RECORD_SCHEMA_DEFINITION
 */

import fs from "fs/promises";
import { parse as parseYaml } from "yaml";
import type { SchemaObject } from "ajv";
import type { RecordSchema } from "../../types/data-model.js";
import { SchemaValidator, formatViolations } from "../validator/schema-validator.js";
import { SchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const RECORD_SCHEMA_DEFINITION: SchemaObject = {
  type: "object",
  required: ["name", "fields"],
  additionalProperties: false,
  properties: {
    name: { type: "string", minLength: 1 },
    fields: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["name", "type", "nullable"],
        additionalProperties: false,
        properties: {
          name: { type: "string", minLength: 1 },
          type: { enum: ["string", "number", "integer", "date", "boolean"] },
          nullable: { type: "boolean" },
          aliases: { type: "array", items: { type: "string", minLength: 1 } },
          normalize: { enum: ["none", "trim", "title"] },
        },
      },
    },
  },
};

const validator = new SchemaValidator<RecordSchema>().compile(RECORD_SCHEMA_DEFINITION);

/**
 * Check an already parsed document and return it as a RecordSchema
 */
export function parseRecordSchema(document: unknown, source = "<inline>"): RecordSchema {
  if (!validator.validate(document)) {
    throw new SchemaError(
      `Invalid record schema in ${source}: ${formatViolations(validator.getErrors())}`,
      { source, violations: validator.getErrors() },
    );
  }

  const seen = new Set<string>();
  for (const field of document.fields) {
    for (const name of [field.name, ...(field.aliases ?? [])]) {
      if (seen.has(name)) {
        throw new SchemaError(`Duplicate column name or alias in ${source}: ${name}`, {
          source,
        });
      }
      seen.add(name);
    }
  }

  return document;
}

/**
 * Load a record schema from a .json, .yaml or .yml file
 */
export async function loadRecordSchema(schemaPath: string): Promise<RecordSchema> {
  let content: string;
  try {
    content = await fs.readFile(schemaPath, "utf-8");
  } catch (error) {
    throw new SchemaError(`Failed to read record schema: ${schemaPath}`, undefined, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = /\.ya?ml$/i.test(schemaPath) ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new SchemaError(`Failed to parse record schema: ${schemaPath}`, undefined, {
      cause: error,
    });
  }

  const schema = parseRecordSchema(document, schemaPath);
  logger.info("Loaded record schema", { schemaPath, fields: schema.fields.length });
  return schema;
}
