#!/usr/bin/env node
import { getErrorMessage } from '@commitguard/core';
import { getLogger } from '@commitguard/logger';
import { Command } from 'commander';

import { registerCheckCommand } from './features/check/check.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program.name('commitguard').description('Validate commit messages against a configurable pattern').version('0.1.0');

  registerCheckCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Unhandled CLI error');
  console.error(`Error: ${getErrorMessage(error)}`);
  process.exit(ExitCodes.GENERAL_ERROR);
});
