/**
 * Standard error classes for estate-etl
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  EXTRACT_ERROR = "EXTRACT_ERROR",
  LOAD_ERROR = "LOAD_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  SCHEMA_ERROR = "SCHEMA_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  QUALITY_GATE_ERROR = "QUALITY_GATE_ERROR",
}

export class EstateEtlError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "EstateEtlError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * Source missing, unreadable, or not parseable into the declared schema
 */
export class ExtractError extends EstateEtlError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.EXTRACT_ERROR, message, details, options);
    this.name = "ExtractError";
  }
}

/**
 * Destination could not be written
 */
export class LoadError extends EstateEtlError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.LOAD_ERROR, message, details, options);
    this.name = "LoadError";
  }
}

export class ConfigError extends EstateEtlError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends EstateEtlError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class SchemaError extends EstateEtlError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_ERROR, message, details, options);
    this.name = "SchemaError";
  }
}

export class ValidationError extends EstateEtlError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

/**
 * Wrap anything thrown into an EstateEtlError, keeping the original as cause
 */
export function toEstateEtlError(
  error: unknown,
  code: ErrorCode = ErrorCode.GENERAL_ERROR,
): EstateEtlError {
  if (error instanceof EstateEtlError) {
    return error;
  }
  return new EstateEtlError(
    code,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
