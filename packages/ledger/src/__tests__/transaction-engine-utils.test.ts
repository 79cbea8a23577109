import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  checkDeposit,
  checkWithdrawal,
  DISPUTE_TRANSITIONS,
  findDisputeTarget,
  nextDisputeState,
} from '../transaction-engine-utils.js';
import type { Account, DepositRecord } from '../types.js';

const account = (overrides: Partial<Account> = {}): Account => ({
  clientId: 1,
  available: new Decimal('10'),
  held: new Decimal('0'),
  locked: false,
  ...overrides,
});

const record = (overrides: Partial<DepositRecord> = {}): DepositRecord => ({
  txId: 1,
  clientId: 1,
  amount: new Decimal('10'),
  state: 'normal',
  ...overrides,
});

describe('checkDeposit', () => {
  it('should check the amount before the lock', () => {
    expect(checkDeposit(account({ locked: true }), new Decimal('0'))._unsafeUnwrapErr()).toBe('invalid_amount');
    expect(checkDeposit(account({ locked: true }), new Decimal('1'))._unsafeUnwrapErr()).toBe('account_locked');
    expect(checkDeposit(account(), new Decimal('0.0001')).isOk()).toBe(true);
  });
});

describe('checkWithdrawal', () => {
  it('should reject locked accounts and overdrafts with one reason', () => {
    expect(checkWithdrawal(account({ locked: true }), new Decimal('1'))._unsafeUnwrapErr()).toBe(
      'insufficient_funds_or_locked'
    );
    expect(checkWithdrawal(account(), new Decimal('10.0001'))._unsafeUnwrapErr()).toBe('insufficient_funds_or_locked');
    expect(checkWithdrawal(account(), new Decimal('-1'))._unsafeUnwrapErr()).toBe('invalid_amount');
    expect(checkWithdrawal(account(), new Decimal('10')).isOk()).toBe(true);
  });
});

describe('findDisputeTarget', () => {
  it('should require an existing record owned by the requesting client', () => {
    expect(findDisputeTarget(undefined, { type: 'dispute', client: 1, tx: 1 })._unsafeUnwrapErr()).toBe(
      'unknown_transaction'
    );
    expect(findDisputeTarget(record({ clientId: 2 }), { type: 'resolve', client: 1, tx: 1 })._unsafeUnwrapErr()).toBe(
      'client_mismatch'
    );
    expect(findDisputeTarget(record(), { type: 'chargeback', client: 1, tx: 1 })._unsafeUnwrap().txId).toBe(1);
  });
});

describe('nextDisputeState', () => {
  it('should follow the dispute transition table', () => {
    expect(DISPUTE_TRANSITIONS).toEqual({
      dispute: { from: 'normal', to: 'disputed' },
      resolve: { from: 'disputed', to: 'normal' },
      chargeback: { from: 'disputed', to: 'charged_back' },
    });

    const held = account({ available: new Decimal('0'), held: new Decimal('10') });
    expect(nextDisputeState(account(), record(), 'dispute')._unsafeUnwrap()).toBe('disputed');
    expect(nextDisputeState(held, record({ state: 'disputed' }), 'resolve')._unsafeUnwrap()).toBe('normal');
    expect(nextDisputeState(held, record({ state: 'disputed' }), 'chargeback')._unsafeUnwrap()).toBe('charged_back');
  });

  it('should report the state error before a funds shortfall', () => {
    const empty = account({ available: new Decimal('0') });

    expect(nextDisputeState(empty, record({ state: 'disputed' }), 'dispute')._unsafeUnwrapErr()).toBe(
      'invalid_state_transition'
    );
    expect(nextDisputeState(empty, record(), 'dispute')._unsafeUnwrapErr()).toBe('insufficient_available_funds');
    expect(nextDisputeState(empty, record({ state: 'disputed' }), 'resolve')._unsafeUnwrapErr()).toBe(
      'insufficient_held_funds'
    );
    expect(nextDisputeState(empty, record({ state: 'charged_back' }), 'chargeback')._unsafeUnwrapErr()).toBe(
      'invalid_state_transition'
    );
  });
});
