#!/usr/bin/env -S node --import tsx
import { flushLoggers, getLogger } from '@ledgerline/logger';

import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { createProgram } from './program.js';

const logger = getLogger('CLI');

async function main(): Promise<void> {
  await createProgram().parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  flushLoggers();
  displayCliError('ledgerline', error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR, 'text');
});
