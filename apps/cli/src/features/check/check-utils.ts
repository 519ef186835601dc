import type { EventContext, RawInputs, RunOutcome } from '@commitguard/core';
import { z } from 'zod';

import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';

/**
 * Check command options validated by Zod at CLI boundary
 */
export const CheckCommandOptionsSchema = z.object({
  eventPath: z.string().min(1, { message: '--event-path must not be empty' }),
  eventName: z.string().min(1, { message: '--event-name must not be empty' }).default('push'),
  pattern: z.string().optional(),
  patternDescription: z.string().optional(),
  checkAll: z.boolean().optional(),
  caseInsensitive: z.boolean().optional(),
  failOnError: z.boolean().default(true),
  customErrorMessage: z.string().optional(),
  json: z.boolean().optional(),
});

export type CheckCommandOptions = z.infer<typeof CheckCommandOptionsSchema>;

export interface CheckParams {
  inputs: RawInputs;
  eventContext: EventContext;
  json: boolean;
}

/**
 * Translate flags into the same string inputs the action receives, so both
 * entry points share one config parser.
 */
export function buildCheckParams(options: CheckCommandOptions): CheckParams {
  return {
    inputs: {
      pattern: options.pattern,
      'pattern-description': options.patternDescription,
      'check-all-commits': String(options.checkAll ?? false),
      'case-sensitive': String(!(options.caseInsensitive ?? false)),
      'fail-on-error': String(options.failOnError),
      'custom-error-message': options.customErrorMessage,
    },
    eventContext: {
      eventName: options.eventName,
      eventPath: options.eventPath,
    },
    json: options.json ?? false,
  };
}

export function outcomeToExitCode(outcome: RunOutcome): ExitCode {
  switch (outcome.status) {
    case 'passed':
      return ExitCodes.SUCCESS;
    case 'failed-validation':
      return outcome.stepFailed ? ExitCodes.VALIDATION_ERROR : ExitCodes.SUCCESS;
    case 'errored':
      return ExitCodes.GENERAL_ERROR;
  }
}
