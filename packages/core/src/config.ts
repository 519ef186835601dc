import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ConfigError } from './errors.js';

export const DEFAULT_PATTERN = '^(feat|fix|docs|style|refactor|test|chore|build|ci|perf|revert)(\\(.+\\))?: .+';
export const DEFAULT_PATTERN_DESCRIPTION = 'Conventional Commits format: type(scope): description';

export const INPUT_NAMES = [
  'pattern',
  'pattern-description',
  'check-all-commits',
  'case-sensitive',
  'fail-on-error',
  'custom-error-message',
] as const;

export type InputName = (typeof INPUT_NAMES)[number];

export type RawInputs = Partial<Record<InputName, string | undefined>>;

export interface ValidatorConfig {
  pattern: string;
  patternDescription: string;
  checkAllCommits: boolean;
  caseSensitive: boolean;
  failOnError: boolean;
  customErrorMessage?: string | undefined;
}

export interface EventContext {
  eventName?: string | undefined;
  eventPath?: string | undefined;
}

/** The CI host passes unset inputs as empty strings */
function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

const textInput = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((val) => blankToUndefined(val) ?? fallback);

const booleanInput = (name: InputName, fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((val, ctx) => {
      const normalized = blankToUndefined(val)?.trim().toLowerCase();
      if (normalized === undefined) return fallback;
      if (normalized === 'true') return true;
      if (normalized === 'false') return false;
      ctx.addIssue({
        code: 'custom',
        message: `Input "${name}" must be "true" or "false", received "${val ?? ''}"`,
      });
      return z.NEVER;
    });

export const ValidatorInputsSchema = z.object({
  pattern: textInput(DEFAULT_PATTERN),
  'pattern-description': textInput(DEFAULT_PATTERN_DESCRIPTION),
  'check-all-commits': booleanInput('check-all-commits', false),
  'case-sensitive': booleanInput('case-sensitive', true),
  'fail-on-error': booleanInput('fail-on-error', true),
  'custom-error-message': z.string().optional().transform(blankToUndefined),
});

/**
 * Parse the string-typed inputs once, at the boundary.
 */
export function parseValidatorConfig(inputs: RawInputs): Result<ValidatorConfig, ConfigError> {
  const result = ValidatorInputsSchema.safeParse(inputs);
  if (!result.success) {
    const issue = result.error.issues[0];
    const input = issue?.path[0];
    const inputName = input === undefined ? undefined : String(input);
    return err(new ConfigError(issue?.message ?? 'Invalid configuration', inputName));
  }

  const data = result.data;
  return ok({
    pattern: data.pattern,
    patternDescription: data['pattern-description'],
    checkAllCommits: data['check-all-commits'],
    caseSensitive: data['case-sensitive'],
    failOnError: data['fail-on-error'],
    customErrorMessage: data['custom-error-message'],
  });
}

const EventEnvSchema = z.object({
  GITHUB_EVENT_NAME: z.string().optional(),
  GITHUB_EVENT_PATH: z.string().optional(),
});

export function parseEventContext(env: NodeJS.ProcessEnv = process.env): Result<EventContext, ConfigError> {
  const result = EventEnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue?.path[0];
    return err(
      new ConfigError(
        issue?.message ?? 'Invalid event environment',
        variable === undefined ? undefined : String(variable)
      )
    );
  }

  return ok({
    eventName: blankToUndefined(result.data.GITHUB_EVENT_NAME),
    eventPath: blankToUndefined(result.data.GITHUB_EVENT_PATH),
  });
}
