import type { DisputeLifecycleEvent } from '@ledgerline/core';
import type { Decimal } from 'decimal.js';
import { err, ok, type Err, type Result } from 'neverthrow';

import type { Account, DepositRecord, DisputeState, RejectionReason } from './types.js';

interface DisputeTransition {
  from: DisputeState;
  to: DisputeState;
}

/**
 * Dispute state machine. `charged_back` has no outgoing edge.
 */
export const DISPUTE_TRANSITIONS: Readonly<Record<DisputeLifecycleEvent['type'], DisputeTransition>> = {
  dispute: { from: 'normal', to: 'disputed' },
  resolve: { from: 'disputed', to: 'normal' },
  chargeback: { from: 'disputed', to: 'charged_back' },
};

function reject(reason: RejectionReason): Err<never, RejectionReason> {
  return err(reason);
}

export function checkDeposit(account: Account, amount: Decimal): Result<void, RejectionReason> {
  if (amount.lte(0)) return reject('invalid_amount');
  if (account.locked) return reject('account_locked');
  return ok();
}

export function checkWithdrawal(account: Account, amount: Decimal): Result<void, RejectionReason> {
  if (amount.lte(0)) return reject('invalid_amount');
  if (account.locked || account.available.lt(amount)) return reject('insufficient_funds_or_locked');
  return ok();
}

/**
 * Find the deposit a dispute, resolve or chargeback refers to and check that the
 * requesting client owns it.
 */
export function findDisputeTarget(
  record: DepositRecord | undefined,
  event: DisputeLifecycleEvent
): Result<DepositRecord, RejectionReason> {
  if (!record) return reject('unknown_transaction');
  if (record.clientId !== event.client) return reject('client_mismatch');
  return ok(record);
}

/**
 * State the record moves to, or the reason the event may not move it.
 * Funds are checked after the state so a double dispute reports the state error.
 */
export function nextDisputeState(
  account: Account,
  record: DepositRecord,
  type: DisputeLifecycleEvent['type']
): Result<DisputeState, RejectionReason> {
  const transition = DISPUTE_TRANSITIONS[type];
  if (record.state !== transition.from) return reject('invalid_state_transition');

  if (type === 'dispute') {
    if (account.available.lt(record.amount)) return reject('insufficient_available_funds');
  } else if (account.held.lt(record.amount)) {
    return reject('insufficient_held_funds');
  }

  return ok(transition.to);
}
