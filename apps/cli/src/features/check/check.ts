import { CommitValidator, parseValidatorConfig, RecordingReporter } from '@commitguard/core';
import { getLogger } from '@commitguard/logger';
import type { Command } from 'commander';

import { createErrorResponse, createSuccessResponse } from '../shared/cli-response.js';
import { ExitCodes, exitCodeToErrorCode, type ExitCode } from '../shared/exit-codes.js';

import { buildCheckParams, CheckCommandOptionsSchema, outcomeToExitCode } from './check-utils.js';
import { ConsoleReporter } from './console-reporter.js';

const logger = getLogger('check');

/**
 * Register the check command.
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Validate the commit messages of a CI event payload against a pattern')
    .requiredOption('--event-path <file>', 'Path to the JSON event payload')
    .option('--event-name <name>', 'Event type of the payload', 'push')
    .option('--pattern <regex>', 'Regex commit subjects must match from their first character')
    .option('--pattern-description <text>', 'Description of the expected format, shown on failure')
    .option('--check-all', 'Report every failing commit instead of stopping at the first')
    .option('--case-insensitive', 'Match the pattern case-insensitively')
    .option('--no-fail-on-error', 'Exit 0 even when validation fails')
    .option('--custom-error-message <text>', 'Message shown instead of the generated failure report')
    .option('--json', 'Output results in JSON format')
    .action((rawOptions: unknown) => {
      process.exitCode = executeCheckCommand(rawOptions);
    });
}

/**
 * Execute the check command and return the exit code.
 */
export function executeCheckCommand(rawOptions: unknown): ExitCode {
  const validationResult = CheckCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    console.error(`Error: ${firstError?.message ?? 'Invalid options'}`);
    return ExitCodes.INVALID_ARGS;
  }

  const params = buildCheckParams(validationResult.data);
  const recorder = new RecordingReporter();
  const reporter = params.json ? recorder : new ConsoleReporter();

  const result = parseValidatorConfig(params.inputs)
    .andThen((config) => CommitValidator.create(config, reporter, { eventContext: params.eventContext }))
    .map((validator) => validator.run());

  if (result.isErr()) {
    logger.error({ error: result.error, input: result.error.input }, 'Invalid check configuration');
    if (params.json) {
      const code = exitCodeToErrorCode(ExitCodes.CONFIG_ERROR);
      console.log(JSON.stringify(createErrorResponse('check', result.error, code), undefined, 2));
    } else {
      console.error(`Error: ${result.error.message}`);
    }
    return ExitCodes.CONFIG_ERROR;
  }

  const outcome = result.value;
  const exitCode = outcomeToExitCode(outcome);

  if (params.json) {
    if (outcome.status === 'errored') {
      const response = createErrorResponse('check', outcome.error, exitCodeToErrorCode(exitCode));
      console.log(JSON.stringify(response, undefined, 2));
    } else {
      const data = {
        status: outcome.status,
        totalCommits: outcome.totalCommits,
        failedCommits: outcome.failedCommits,
        outputs: recorder.outputs,
        messages: recorder.messages,
      };
      const response =
        exitCode === ExitCodes.SUCCESS
          ? createSuccessResponse('check', data)
          : createErrorResponse(
              'check',
              new Error(recorder.failureMessage ?? 'Commit validation failed'),
              exitCodeToErrorCode(exitCode),
              data
            );
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  return exitCode;
}
