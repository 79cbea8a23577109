import type { Decimal } from 'decimal.js';

export const TRANSACTION_TYPES = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/** Largest client id accepted on input (unsigned 16-bit). */
export const MAX_CLIENT_ID = 65_535;

/** Largest transaction id accepted on input (unsigned 32-bit). */
export const MAX_TX_ID = 4_294_967_295;

export interface DepositEvent {
  type: 'deposit';
  client: number;
  tx: number;
  amount: Decimal;
}

export interface WithdrawalEvent {
  type: 'withdrawal';
  client: number;
  tx: number;
  amount: Decimal;
}

/**
 * Dispute, resolve and chargeback reference an earlier deposit by `tx`.
 * They carry no amount of their own: the deposit's recorded amount is used.
 */
export interface DisputeEvent {
  type: 'dispute';
  client: number;
  tx: number;
}

export interface ResolveEvent {
  type: 'resolve';
  client: number;
  tx: number;
}

export interface ChargebackEvent {
  type: 'chargeback';
  client: number;
  tx: number;
}

export type TransactionEvent = DepositEvent | WithdrawalEvent | DisputeEvent | ResolveEvent | ChargebackEvent;

export type FundsMovementEvent = DepositEvent | WithdrawalEvent;
export type DisputeLifecycleEvent = DisputeEvent | ResolveEvent | ChargebackEvent;

export function isFundsMovementEvent(event: TransactionEvent): event is FundsMovementEvent {
  return event.type === 'deposit' || event.type === 'withdrawal';
}
