/**
 * Semantic exit codes for the CLI.
 * Numbering follows POSIX conventions; gaps are intentional so codes stay stable.
 */
export const ExitCodes = {
  /** Successful execution (including failed validation with --no-fail-on-error) */
  SUCCESS: 0,

  /** General error (catch-all, unreadable event payload) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** One or more commit messages did not match the pattern */
  VALIDATION_ERROR: 8,

  /** Configuration error (invalid pattern or input) */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    8: 'VALIDATION_ERROR',
    11: 'CONFIG_ERROR',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
