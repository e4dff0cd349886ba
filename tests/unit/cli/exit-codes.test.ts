import { describe, it, expect } from 'vitest';
import {
  EXIT_CONFIG_ERROR,
  EXIT_FILE_IO_ERROR,
  EXIT_QUALITY_FAILURE,
  exitCodeForError,
  exitCodeForThrown,
} from '../../../src/cli/exit-codes.js';
import { ConfigError, ErrorCode, LoadError } from '../../../src/utils/errors.js';

describe('exit codes', () => {
  it.each([
    [ErrorCode.CONFIG_ERROR, EXIT_CONFIG_ERROR],
    [ErrorCode.SCHEMA_ERROR, EXIT_CONFIG_ERROR],
    [ErrorCode.EXTRACT_ERROR, EXIT_FILE_IO_ERROR],
    [ErrorCode.LOAD_ERROR, EXIT_FILE_IO_ERROR],
    [ErrorCode.FILE_IO_ERROR, EXIT_FILE_IO_ERROR],
    [ErrorCode.QUALITY_GATE_ERROR, EXIT_QUALITY_FAILURE],
    [ErrorCode.VALIDATION_ERROR, EXIT_QUALITY_FAILURE],
  ])('maps %s to %i', (code, expected) => {
    expect(exitCodeForError(code)).toBe(expected);
  });

  it('maps thrown errors by their code', () => {
    expect(exitCodeForThrown(new ConfigError('bad'))).toBe(3);
    expect(exitCodeForThrown(new LoadError('disk full'))).toBe(4);
    expect(exitCodeForThrown(new Error('boom'))).toBe(1);
  });
});
