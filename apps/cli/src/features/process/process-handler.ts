import { stat } from 'node:fs/promises';

import { LedgerInvariantError } from '@ledgerline/core';
import { assertLedgerInvariants, TransactionEngine } from '@ledgerline/ledger';
import { getLogger } from '@ledgerline/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

import { sortByClient, type ProcessHandlerParams, type ProcessResult } from './process-utils.js';
import { createTransactionLogListener } from './transaction-log.js';
import { CsvTransactionReader } from './transaction-reader.js';

const logger = getLogger('ProcessHandler');

/**
 * Process handler - streams the input file through a fresh TransactionEngine
 * and returns the final balances.
 */
export class ProcessHandler implements CommandHandler<ProcessHandlerParams, ProcessResult> {
  /**
   * Ledger invariant violations are rethrown: they are defects, not input errors.
   */
  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    try {
      const stats = await stat(params.inputPath);
      if (!stats.isFile()) {
        return err(new Error(`Input path is not a file: ${params.inputPath}`));
      }

      logger.debug({ params }, 'Starting processing');

      const reader = new CsvTransactionReader(params.inputPath);
      const engine = new TransactionEngine({
        onOutcome: params.transactionLogPath ? createTransactionLogListener() : undefined,
      });

      const summary = await engine.applyStream(reader.events());
      assertLedgerInvariants(engine.store);

      logger.info(
        {
          accounts: engine.store.accountCount,
          applied: summary.applied,
          rejected: summary.rejected,
          skippedRows: reader.skippedRows,
        },
        'Processing complete'
      );

      return ok({
        accounts: sortByClient(engine.store.snapshot()),
        summary,
        skippedRows: reader.skippedRows,
      });
    } catch (error) {
      if (error instanceof LedgerInvariantError) {
        throw error;
      }
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Cleanup resources (none held between runs).
   */
  destroy(): void {
    // Nothing to release: each execute() owns its reader and engine
  }
}
