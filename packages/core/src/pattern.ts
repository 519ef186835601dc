import { err, ok, type Result } from 'neverthrow';

import { ConfigError, getErrorMessage } from './errors.js';

export interface CompiledPattern {
  readonly source: string;
  readonly caseSensitive: boolean;
  /** True iff the pattern matches starting at the first character of `text` */
  matches(text: string): boolean;
}

/**
 * Compile a commit pattern once per run.
 *
 * The sticky flag pins every attempt to index 0, so a pattern without `^`
 * still cannot match in the middle of a message. Case-insensitivity is the
 * engine's `i` flag; messages are never lower-cased.
 */
export function compilePattern(source: string, caseSensitive: boolean): Result<CompiledPattern, ConfigError> {
  if (source.trim().length === 0) {
    return err(new ConfigError('Pattern must not be empty', 'pattern'));
  }

  let regex: RegExp;
  try {
    regex = new RegExp(source, caseSensitive ? 'y' : 'iy');
  } catch (error) {
    return err(new ConfigError(`Invalid regex pattern: ${getErrorMessage(error)}`, 'pattern'));
  }

  return ok({
    source,
    caseSensitive,
    matches(text: string): boolean {
      regex.lastIndex = 0;
      return regex.test(text);
    },
  });
}
