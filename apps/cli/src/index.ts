#!/usr/bin/env node
import { getErrorMessage } from '@withdrawal-audit/core';
import { flushLoggers, getLogger, initLogger, loggerConfigFromEnv, validateLoggerEnv } from '@withdrawal-audit/logger';
import { Command } from 'commander';

import { registerEvaluateCommand } from './features/evaluate/evaluate.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

function configureLogging(): void {
  try {
    initLogger(loggerConfigFromEnv(validateLoggerEnv(process.env)));
  } catch (error) {
    process.stderr.write(`${getErrorMessage(error)}\n`);
    process.exit(ExitCodes.CONFIG_ERROR);
  }
}

async function main(): Promise<void> {
  configureLogging();

  program.name('withdrawal-audit').description('Score real-money withdrawal tests by risk').version('0.1.0');

  // Evaluate command - score measurements from a JSON file
  registerEvaluateCommand(program);

  await program.parseAsync();
  flushLoggers();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error({ error }, 'CLI failed');
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});
