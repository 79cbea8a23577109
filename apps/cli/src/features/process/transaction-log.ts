import { formatFixed, isFundsMovementEvent } from '@ledgerline/core';
import type { OutcomeListener } from '@ledgerline/ledger';
import { getLogger, type Logger } from '@ledgerline/logger';
import { FileSink } from '@ledgerline/logger/file';

/** Logger category the transaction log file sink listens to. */
export const TRANSACTION_LOG_CATEGORY = 'transactions';

/**
 * File sink for the transaction log. Drains instead of dropping on overflow,
 * so every outcome reaches the file.
 */
export function createTransactionLogSink(path: string): FileSink {
  return new FileSink({ path, level: 'info', categories: [TRANSACTION_LOG_CATEGORY], overflow: 'drain' });
}

/**
 * Outcome listener writing one info entry per processed event.
 */
export function createTransactionLogListener(logger: Logger = getLogger(TRANSACTION_LOG_CATEGORY)): OutcomeListener {
  return (outcome) => {
    const { event } = outcome;
    const context: Record<string, unknown> = { type: event.type, client: event.client, tx: event.tx };

    if (isFundsMovementEvent(event)) {
      context['amount'] = formatFixed(event.amount);
    }
    context['status'] = outcome.status;

    if (outcome.status === 'rejected') {
      context['reason'] = outcome.reason;
      logger.info(context, 'Transaction rejected');
      return;
    }

    logger.info(context, 'Transaction applied');
  };
}
