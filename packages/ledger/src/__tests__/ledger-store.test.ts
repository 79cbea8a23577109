import { DuplicateTransactionError } from '@ledgerline/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { LedgerStore } from '../ledger-store.js';

describe('LedgerStore', () => {
  it('should create a zeroed, unlocked account on first reference', () => {
    const store = new LedgerStore();

    const account = store.getOrCreateAccount(7);

    expect(account.clientId).toBe(7);
    expect(account.available.toString()).toBe('0');
    expect(account.held.toString()).toBe('0');
    expect(account.locked).toBe(false);
    expect(store.accountCount).toBe(1);
  });

  it('should return the same account for repeated lookups', () => {
    const store = new LedgerStore();

    const first = store.getOrCreateAccount(1);
    first.available = new Decimal('5');
    const second = store.getOrCreateAccount(1);

    expect(second).toBe(first);
    expect(second.available.toString()).toBe('5');
    expect(store.accountCount).toBe(1);
  });

  it('should not create accounts from findAccount', () => {
    const store = new LedgerStore();

    expect(store.findAccount(3)).toBeUndefined();
    expect(store.accountCount).toBe(0);
  });

  it('should record a deposit in the normal state', () => {
    const store = new LedgerStore();

    const record = store.recordDeposit(10, 1, new Decimal('2.5'))._unsafeUnwrap();

    expect(record).toEqual({ txId: 10, clientId: 1, amount: new Decimal('2.5'), state: 'normal' });
    expect(store.findDisputable(10)).toBe(record);
    expect(store.depositCount).toBe(1);
  });

  it('should reject a duplicate transaction id without overwriting the record', () => {
    const store = new LedgerStore();
    store.recordDeposit(10, 1, new Decimal('2.5'))._unsafeUnwrap();

    const error = store.recordDeposit(10, 2, new Decimal('9'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(DuplicateTransactionError);
    expect(error.message).toBe('Transaction 10 is already recorded');
    expect(error.transactionId).toBe(10);
    expect(store.findDisputable(10)?.clientId).toBe(1);
    expect(store.findDisputable(10)?.amount.toString()).toBe('2.5');
    expect(store.depositCount).toBe(1);
  });

  it('should return undefined for unknown transactions', () => {
    const store = new LedgerStore();

    expect(store.findDisputable(999)).toBeUndefined();
  });

  it('should snapshot accounts in insertion order with derived totals', () => {
    const store = new LedgerStore();
    const second = store.getOrCreateAccount(2);
    second.available = new Decimal('1.5');
    second.held = new Decimal('2.25');
    store.getOrCreateAccount(1).locked = true;

    const snapshot = store.snapshot();

    expect(snapshot.map((row) => row.clientId)).toEqual([2, 1]);
    expect(snapshot[0]?.total.toString()).toBe('3.75');
    expect(snapshot[1]?.total.toString()).toBe('0');
    expect(snapshot[1]?.locked).toBe(true);
  });
});
