import type { TransactionEvent } from '@ledgerline/core';
import type { Decimal } from 'decimal.js';

/**
 * Per-client balances. `total` is never stored: it is always `available + held`.
 */
export interface Account {
  readonly clientId: number;
  available: Decimal;
  held: Decimal;
  /** Set by a chargeback and never cleared. */
  locked: boolean;
}

export const DISPUTE_STATES = ['normal', 'disputed', 'charged_back'] as const;

/**
 * A resolved deposit returns to `normal` and may be disputed again.
 * `charged_back` is terminal.
 */
export type DisputeState = (typeof DISPUTE_STATES)[number];

/**
 * Stored for every applied deposit, the only disputable transaction type.
 */
export interface DepositRecord {
  readonly txId: number;
  readonly clientId: number;
  readonly amount: Decimal;
  state: DisputeState;
}

export interface AccountSnapshot {
  readonly clientId: number;
  readonly available: Decimal;
  readonly held: Decimal;
  readonly total: Decimal;
  readonly locked: boolean;
}

export const REJECTION_REASONS = [
  'invalid_amount',
  'account_locked',
  'duplicate_transaction',
  'insufficient_funds_or_locked',
  'unknown_transaction',
  'client_mismatch',
  'invalid_state_transition',
  'insufficient_available_funds',
  'insufficient_held_funds',
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export type TransactionOutcome =
  | { event: TransactionEvent; status: 'applied' }
  | { event: TransactionEvent; status: 'rejected'; reason: RejectionReason };

export type OutcomeListener = (outcome: TransactionOutcome) => void;

export interface ProcessingSummary {
  processed: number;
  applied: number;
  rejected: number;
  rejectionsByReason: Partial<Record<RejectionReason, number>>;
}
