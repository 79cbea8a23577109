import type { DisputeLifecycleEvent, TransactionEvent } from '@ledgerline/core';
import { getLogger } from '@ledgerline/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { assertAccountInvariants } from './invariants.js';
import { LedgerStore } from './ledger-store.js';
import { checkDeposit, checkWithdrawal, findDisputeTarget, nextDisputeState } from './transaction-engine-utils.js';
import type { Account, OutcomeListener, ProcessingSummary, RejectionReason, TransactionOutcome } from './types.js';

export interface TransactionEngineOptions {
  /** Store to apply events to. Default: a new empty store */
  store?: LedgerStore | undefined;
  /** Called once per event, after the event was applied or rejected. */
  onOutcome?: OutcomeListener | undefined;
  /** Check balance invariants after every applied event. Default: true */
  verifyInvariants?: boolean | undefined;
}

/**
 * TransactionEngine - Applies transaction events, in order, to a LedgerStore
 *
 * Each event either mutates exactly the account it names and is reported as
 * applied, or leaves all state untouched and is reported as rejected with a
 * reason. Rejections never stop processing.
 */
export class TransactionEngine {
  readonly store: LedgerStore;

  private readonly logger = getLogger('TransactionEngine');
  private readonly onOutcome: OutcomeListener | undefined;
  private readonly verifyInvariants: boolean;
  private readonly counts: ProcessingSummary = {
    processed: 0,
    applied: 0,
    rejected: 0,
    rejectionsByReason: {},
  };

  constructor(options?: TransactionEngineOptions) {
    this.store = options?.store ?? new LedgerStore();
    this.onOutcome = options?.onOutcome;
    this.verifyInvariants = options?.verifyInvariants ?? true;
  }

  /**
   * Apply or reject one event. The client's account is created first, so a
   * rejected event still makes the client appear in the report.
   *
   * @throws LedgerInvariantError if an applied event left the account inconsistent
   */
  apply(event: TransactionEvent): TransactionOutcome {
    const account = this.store.getOrCreateAccount(event.client);
    const result = this.dispatch(account, event);

    const outcome: TransactionOutcome = result.match(
      () => ({ event, status: 'applied' as const }),
      (reason) => ({ event, status: 'rejected' as const, reason })
    );

    if (outcome.status === 'applied' && this.verifyInvariants) {
      assertAccountInvariants(account);
    }

    this.record(outcome);
    this.onOutcome?.(outcome);
    return outcome;
  }

  applyAll(events: Iterable<TransactionEvent>): ProcessingSummary {
    for (const event of events) {
      this.apply(event);
    }
    return this.summary();
  }

  /**
   * Consume an async source (such as a CSV parser) one event at a time.
   */
  async applyStream(events: AsyncIterable<TransactionEvent>): Promise<ProcessingSummary> {
    for await (const event of events) {
      this.apply(event);
    }
    return this.summary();
  }

  summary(): ProcessingSummary {
    return {
      processed: this.counts.processed,
      applied: this.counts.applied,
      rejected: this.counts.rejected,
      rejectionsByReason: { ...this.counts.rejectionsByReason },
    };
  }

  private dispatch(account: Account, event: TransactionEvent): Result<void, RejectionReason> {
    switch (event.type) {
      case 'deposit':
        return this.deposit(account, event.tx, event.amount);
      case 'withdrawal':
        return this.withdraw(account, event.amount);
      case 'dispute':
      case 'resolve':
      case 'chargeback':
        return this.transitionDispute(account, event);
    }
  }

  private deposit(account: Account, txId: number, amount: Decimal): Result<void, RejectionReason> {
    const check = checkDeposit(account, amount);
    if (check.isErr()) return err(check.error);

    const recorded = this.store.recordDeposit(txId, account.clientId, amount);
    if (recorded.isErr()) {
      this.logger.debug({ clientId: account.clientId, txId }, recorded.error.message);
      return err('duplicate_transaction');
    }

    account.available = account.available.plus(amount);
    return ok();
  }

  private withdraw(account: Account, amount: Decimal): Result<void, RejectionReason> {
    const check = checkWithdrawal(account, amount);
    if (check.isErr()) return err(check.error);

    account.available = account.available.minus(amount);
    return ok();
  }

  private transitionDispute(account: Account, event: DisputeLifecycleEvent): Result<void, RejectionReason> {
    const target = findDisputeTarget(this.store.findDisputable(event.tx), event);
    if (target.isErr()) return err(target.error);

    const record = target.value;
    const next = nextDisputeState(account, record, event.type);
    if (next.isErr()) return err(next.error);

    switch (event.type) {
      case 'dispute':
        account.available = account.available.minus(record.amount);
        account.held = account.held.plus(record.amount);
        break;
      case 'resolve':
        account.held = account.held.minus(record.amount);
        account.available = account.available.plus(record.amount);
        break;
      case 'chargeback':
        account.held = account.held.minus(record.amount);
        account.locked = true;
        break;
    }

    record.state = next.value;
    return ok();
  }

  private record(outcome: TransactionOutcome): void {
    this.counts.processed++;

    if (outcome.status === 'applied') {
      this.counts.applied++;
      return;
    }

    this.counts.rejected++;
    this.counts.rejectionsByReason[outcome.reason] = (this.counts.rejectionsByReason[outcome.reason] ?? 0) + 1;
    this.logger.debug(
      { type: outcome.event.type, client: outcome.event.client, tx: outcome.event.tx, reason: outcome.reason },
      'Transaction rejected'
    );
  }
}
