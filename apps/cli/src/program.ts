import { Command } from 'commander';

import { registerProcessCommand } from './features/process/process.js';

export const CLI_VERSION = '1.0.0';

/**
 * Build the command tree. Kept apart from the entry point so tests can parse
 * argument lists without starting the process handlers.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('ledgerline')
    .description('Apply client transactions from a CSV file and report final account balances')
    .version(CLI_VERSION)
    .showHelpAfterError();

  registerProcessCommand(program);

  return program;
}
