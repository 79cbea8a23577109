import { DuplicateTransactionError } from '@ledgerline/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { Account, AccountSnapshot, DepositRecord } from './types.js';

/**
 * In-memory accounts and deposit records for one processing run.
 *
 * Accounts are keyed by client id and records by transaction id. Neither is ever
 * removed. The store does not enforce balance rules: that is the engine's job.
 */
export class LedgerStore {
  private readonly accounts = new Map<number, Account>();
  private readonly deposits = new Map<number, DepositRecord>();

  getOrCreateAccount(clientId: number): Account {
    const existing = this.accounts.get(clientId);
    if (existing) {
      return existing;
    }

    const account: Account = {
      clientId,
      available: new Decimal(0),
      held: new Decimal(0),
      locked: false,
    };
    this.accounts.set(clientId, account);
    return account;
  }

  findAccount(clientId: number): Account | undefined {
    return this.accounts.get(clientId);
  }

  /**
   * Store a deposit in the `normal` state. An existing record for `txId` is kept as is.
   */
  recordDeposit(txId: number, clientId: number, amount: Decimal): Result<DepositRecord, DuplicateTransactionError> {
    if (this.deposits.has(txId)) {
      return err(new DuplicateTransactionError(txId));
    }

    const record: DepositRecord = { txId, clientId, amount, state: 'normal' };
    this.deposits.set(txId, record);
    return ok(record);
  }

  findDisputable(txId: number): DepositRecord | undefined {
    return this.deposits.get(txId);
  }

  depositRecords(): IterableIterator<DepositRecord> {
    return this.deposits.values();
  }

  /**
   * Balances of every account in the order accounts were first referenced.
   */
  snapshot(): AccountSnapshot[] {
    return Array.from(this.accounts.values(), (account) => ({
      clientId: account.clientId,
      available: account.available,
      held: account.held,
      total: account.available.plus(account.held),
      locked: account.locked,
    }));
  }

  get accountCount(): number {
    return this.accounts.size;
  }

  get depositCount(): number {
    return this.deposits.size;
  }
}
