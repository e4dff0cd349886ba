/**
 * Structural validation of configuration and schema documents using Ajv
 */

import AjvModule from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";

// ajv is CommonJS; its constructor is the module's default export
const Ajv = AjvModule.default;

export interface SchemaViolation {
  path: string;
  message: string;
}

/**
 * Compiled JSON Schema validator narrowing unknown input to T
 */
export class SchemaValidator<T> {
  private ajv: InstanceType<typeof Ajv>;
  private validateFn: ValidateFunction<T> | null = null;

  constructor() {
    this.ajv = new Ajv({
      strict: false,
      allErrors: true, // Collect all validation errors
    });
  }

  /**
   * Compile the JSON Schema for validation
   */
  compile(schema: SchemaObject): this {
    this.validateFn = this.ajv.compile<T>(schema);
    return this;
  }

  /**
   * Validate a single value against the compiled schema
   */
  validate(value: unknown): value is T {
    if (!this.validateFn) {
      throw new Error("Schema not compiled. Call compile() first.");
    }

    return this.validateFn(value);
  }

  /**
   * Get validation errors for the last validation
   */
  getErrors(): SchemaViolation[] {
    if (!this.validateFn || !this.validateFn.errors) {
      return [];
    }

    return this.validateFn.errors.map((error: ErrorObject) => {
      // For missing required properties, Ajv includes the field name in params
      const path =
        error.keyword === "required" && "missingProperty" in error.params
          ? `${error.instancePath}/${String(error.params.missingProperty)}`
          : error.instancePath || "/";

      return {
        path,
        message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
      };
    });
  }
}

/**
 * Render violations as one line for error messages
 */
export function formatViolations(violations: SchemaViolation[]): string {
  return violations.map((v) => `${v.path}: ${v.message}`).join("; ");
}
