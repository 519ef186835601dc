import { describe, expect, it } from 'vitest';

import { ExitCodes, exitCodeToErrorCode } from '../exit-codes.js';

describe('exit-codes', () => {
  it('should define SUCCESS as 0', () => {
    expect(ExitCodes.SUCCESS).toBe(0);
  });

  it('should define error codes', () => {
    expect(ExitCodes.GENERAL_ERROR).toBe(1);
    expect(ExitCodes.INVALID_ARGS).toBe(2);
    expect(ExitCodes.VALIDATION_ERROR).toBe(8);
    expect(ExitCodes.CONFIG_ERROR).toBe(11);
  });

  it('should have unique exit codes', () => {
    const codes = Object.values(ExitCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it('should map exit codes to error code strings', () => {
    expect(exitCodeToErrorCode(ExitCodes.VALIDATION_ERROR)).toBe('VALIDATION_ERROR');
    expect(exitCodeToErrorCode(ExitCodes.CONFIG_ERROR)).toBe('CONFIG_ERROR');
    expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('UNKNOWN_ERROR');
  });
});
