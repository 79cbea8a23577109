// Pure utility functions for the process command

import { formatFixed } from '@ledgerline/core';
import type { AccountSnapshot, ProcessingSummary } from '@ledgerline/ledger';
import { isLevelEnabled, type LogLevel } from '@ledgerline/logger';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import type { ProcessCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Process handler parameters.
 */
export interface ProcessHandlerParams {
  /** Transaction CSV to read */
  inputPath: string;

  /** Append one line per transaction outcome to this file (only with --log-transactions) */
  transactionLogPath?: string | undefined;
}

export interface ProcessResult {
  /** Final balances, sorted by client id */
  accounts: AccountSnapshot[];
  summary: ProcessingSummary;
  /** Rows dropped by the reader before reaching the engine */
  skippedRows: number;
}

/**
 * One account as printed in the report, amounts fixed to four decimal places.
 */
export interface AccountRow {
  client: number;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

export const ACCOUNTS_CSV_HEADER = 'client,available,held,total,locked';

/**
 * Build process parameters from validated CLI flags.
 */
export function buildProcessParamsFromFlags(
  input: string,
  options: ProcessCommandOptions,
  defaults: { transactionLogPath: string }
): Result<ProcessHandlerParams, Error> {
  const inputPath = input.trim();
  if (inputPath === '') {
    return err(new Error('Input file path must not be empty'));
  }

  if (!options.logTransactions) {
    return ok({ inputPath });
  }

  return ok({ inputPath, transactionLogPath: options.logFile ?? defaults.transactionLogPath });
}

/**
 * Console sink threshold and the global threshold needed so that transaction
 * log entries (written at info) still pass when the console is quieter.
 */
export function resolveLogLevels(
  verbose: boolean,
  configuredLevel: LogLevel,
  logTransactions: boolean
): { level: LogLevel; consoleLevel: LogLevel } {
  const consoleLevel: LogLevel = verbose ? 'debug' : configuredLevel;
  const level: LogLevel = logTransactions && !isLevelEnabled('info', consoleLevel) ? 'info' : consoleLevel;
  return { level, consoleLevel };
}

export function sortByClient(accounts: readonly AccountSnapshot[]): AccountSnapshot[] {
  return [...accounts].sort((a, b) => a.clientId - b.clientId);
}

export function toAccountRow(account: AccountSnapshot): AccountRow {
  return {
    client: account.clientId,
    available: formatFixed(account.available),
    held: formatFixed(account.held),
    total: formatFixed(account.total),
    locked: account.locked,
  };
}

/**
 * Render the balance report: a header row, then one row per client in client id order.
 */
export function formatAccountsCsv(accounts: readonly AccountSnapshot[]): string {
  const lines = [ACCOUNTS_CSV_HEADER];

  for (const account of sortByClient(accounts)) {
    const row = toAccountRow(account);
    lines.push([String(row.client), row.available, row.held, row.total, String(row.locked)].join(','));
  }

  return lines.join('\n') + '\n';
}
