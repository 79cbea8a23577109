import { getLogLevel, getTransactionLogPath } from '@ledgerline/env';
import { ConsoleSink, flushLoggers, initLogger, type LogLevel, type Sink } from '@ledgerline/logger';
import type { Command } from 'commander';
import { err, ok, type Result } from 'neverthrow';

import { displayCliError, exitCodeForError } from '../shared/cli-error.js';
import { createSuccessResponse } from '../shared/cli-response.js';
import { unwrapResult } from '../shared/command-execution.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler } from './process-handler.js';
import {
  buildProcessParamsFromFlags,
  formatAccountsCsv,
  resolveLogLevels,
  toAccountRow,
  type ProcessResult,
} from './process-utils.js';
import { createTransactionLogSink } from './transaction-log.js';

interface EnvironmentSettings {
  logLevel: LogLevel;
  transactionLogPath: string;
}

/**
 * Register the process command. It is the default command, so
 * `ledgerline transactions.csv` and `ledgerline process transactions.csv` are equivalent.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Apply a transaction CSV and print the final balance of every client')
    .argument('<input>', 'Transaction CSV with a type,client,tx,amount header')
    .option('--log-transactions', 'Append the outcome of every transaction to the transaction log')
    .option('--log-file <path>', 'Transaction log path (default: $LEDGERLINE_TRANSACTION_LOG or transactions.log)')
    .option('--verbose', 'Print diagnostics to stderr at debug level')
    .option('--json', 'Output results in JSON format')
    .action(async (input: string, rawOptions: unknown) => {
      await executeProcessCommand(input, rawOptions);
    });
}

function readEnvironment(): Result<EnvironmentSettings, Error> {
  try {
    return ok({ logLevel: getLogLevel(), transactionLogPath: getTransactionLogPath() });
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

function configureLogging(verbose: boolean, configuredLevel: LogLevel, transactionLogPath: string | undefined): void {
  const { level, consoleLevel } = resolveLogLevels(verbose, configuredLevel, transactionLogPath !== undefined);
  const sinks: Sink[] = [new ConsoleSink({ level: consoleLevel, color: process.stderr.isTTY })];

  if (transactionLogPath !== undefined) {
    sinks.push(createTransactionLogSink(transactionLogPath));
  }

  initLogger({ level, sinks });
}

/**
 * Execute the process command.
 */
export async function executeProcessCommand(input: string, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError(
      'process',
      new Error(firstError?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS,
      isJsonMode ? 'json' : 'text'
    );
  }

  const options = validationResult.data;
  const format = options.json ? 'json' : 'text';

  const environment = readEnvironment();
  if (environment.isErr()) {
    displayCliError('process', environment.error, ExitCodes.CONFIG_ERROR, format);
  }

  const startTime = Date.now();
  let result: ProcessResult;

  try {
    const params = unwrapResult(
      buildProcessParamsFromFlags(input, options, { transactionLogPath: environment.value.transactionLogPath })
    );
    configureLogging(options.verbose === true, environment.value.logLevel, params.transactionLogPath);

    const handler = new ProcessHandler();
    try {
      result = unwrapResult(await handler.execute(params));
    } finally {
      handler.destroy();
    }
  } catch (error) {
    flushLoggers();
    const cause = error instanceof Error ? error : new Error(String(error));
    displayCliError('process', cause, exitCodeForError(cause), format);
  }

  flushLoggers();

  if (options.json) {
    const response = createSuccessResponse(
      'process',
      {
        accounts: result.accounts.map(toAccountRow),
        summary: { ...result.summary, skippedRows: result.skippedRows },
      },
      { duration_ms: Date.now() - startTime }
    );
    process.stdout.write(JSON.stringify(response, undefined, 2) + '\n');
    return;
  }

  process.stdout.write(formatAccountsCsv(result.accounts));
}
