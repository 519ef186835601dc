/**
 * Malformed or missing configuration, including a pattern that does not compile.
 * Fatal for the run.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    public readonly input?: string | undefined
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The event payload could not be read or parsed. Fatal for the run; no partial
 * commit list is ever returned alongside it.
 */
export class LoadError extends Error {
  readonly code = 'LOAD_ERROR';

  constructor(
    message: string,
    public readonly eventPath: string
  ) {
    super(message);
    this.name = 'LoadError';
  }
}

export function isErrorWithMessage(error: unknown): error is Error & { message: string } {
  return error instanceof Error && typeof error.message === 'string';
}

/**
 * Extract error message from unknown error value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return defaultMessage || String(error);
}
