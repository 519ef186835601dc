import {
  CommitValidator,
  type ConfigError,
  parseEventContext,
  parseValidatorConfig,
  type RunOutcome,
} from '@commitguard/core';
import { getLogger } from '@commitguard/logger';
import type { Result } from 'neverthrow';

import { GitHubActionReporter } from './github-action-reporter.js';
import { readActionInputs } from './inputs.js';

const logger = getLogger('action');

/**
 * Entry point of the action. Inputs and the event context are parsed once
 * here; nothing below this function reads the environment.
 */
export function runAction(env: NodeJS.ProcessEnv = process.env): Result<RunOutcome, ConfigError> {
  const reporter = new GitHubActionReporter();

  const result = parseEventContext(env).andThen((eventContext) =>
    parseValidatorConfig(readActionInputs())
      .andThen((config) => CommitValidator.create(config, reporter, { eventContext }))
      .map((validator) => validator.run())
  );

  if (result.isErr()) {
    logger.error({ error: result.error, input: result.error.input }, 'Invalid action configuration');
    reporter.setFailed(`Invalid configuration: ${result.error.message}`);
    return result;
  }

  logger.debug({ status: result.value.status }, 'Action finished');
  return result;
}
