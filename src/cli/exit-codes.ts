/**
 * Process exit codes
 */

import type { ProcessingReport } from "../types/data-model.js";
import { ErrorCode, EstateEtlError } from "../utils/errors.js";

export const EXIT_SUCCESS = 0;
export const EXIT_QUALITY_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 3;
export const EXIT_FILE_IO_ERROR = 4;

export function exitCodeForError(code: string): number {
  switch (code) {
    case ErrorCode.CONFIG_ERROR:
    case ErrorCode.SCHEMA_ERROR:
      return EXIT_CONFIG_ERROR;
    case ErrorCode.EXTRACT_ERROR:
    case ErrorCode.LOAD_ERROR:
    case ErrorCode.FILE_IO_ERROR:
      return EXIT_FILE_IO_ERROR;
    default:
      return EXIT_QUALITY_FAILURE;
  }
}

export function exitCodeForReport(report: ProcessingReport): number {
  if (report.state === "Done") {
    return EXIT_SUCCESS;
  }
  const first = report.fatalErrors[0];
  return first ? exitCodeForError(first.code) : EXIT_QUALITY_FAILURE;
}

/**
 * Exit code for an error thrown before or around a pipeline run
 */
export function exitCodeForThrown(error: unknown): number {
  return error instanceof EstateEtlError ? exitCodeForError(error.code) : EXIT_QUALITY_FAILURE;
}
