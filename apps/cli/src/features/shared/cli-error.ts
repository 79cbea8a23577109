import { LedgerInvariantError, ValidationError } from '@ledgerline/core';
import { CsvError } from 'csv-parse';
import pc from 'picocolors';

import { createErrorResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'The input file was not found. Double-check the path and try again.',
  VALIDATION_ERROR: 'The input must be a CSV file with a `type,client,tx,amount` header row.',
};

/**
 * Node system errors carry a string `code` such as ENOENT.
 */
function systemErrorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Pick the exit code for an error that ended the run.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof LedgerInvariantError) return ExitCodes.GENERAL_ERROR;
  if (error instanceof ValidationError || error instanceof CsvError) return ExitCodes.VALIDATION_ERROR;

  switch (systemErrorCode(error)) {
    case 'ENOENT':
      return ExitCodes.NOT_FOUND;
    case 'EACCES':
    case 'EPERM':
      return ExitCodes.PERMISSION_DENIED;
    default:
      return ExitCodes.GENERAL_ERROR;
  }
}

/**
 * Display a CLI error and exit.
 *
 * - Text mode: formatted error to stderr with contextual tips
 * - JSON mode: structured JSON error to stdout
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode, format: 'json' | 'text'): never {
  const code = exitCodeToErrorCode(exitCode);

  if (format === 'json') {
    console.log(JSON.stringify(createErrorResponse(command, error, code), undefined, 2));
  } else {
    process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      process.stderr.write(`\n${pc.dim(tip)}\n`);
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
    }
  }

  process.exit(exitCode);
}
