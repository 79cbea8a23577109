import { isNegative, LedgerInvariantError } from '@ledgerline/core';
import { Decimal } from 'decimal.js';

import type { LedgerStore } from './ledger-store.js';
import type { Account } from './types.js';

export function assertAccountInvariants(account: Account): void {
  if (isNegative(account.available)) {
    throw new LedgerInvariantError(
      `Client ${String(account.clientId)} has negative available funds: ${account.available.toFixed()}`,
      { additionalContext: { clientId: account.clientId, available: account.available.toFixed() } }
    );
  }

  if (isNegative(account.held)) {
    throw new LedgerInvariantError(
      `Client ${String(account.clientId)} has negative held funds: ${account.held.toFixed()}`,
      { additionalContext: { clientId: account.clientId, held: account.held.toFixed() } }
    );
  }
}

/**
 * Whole-ledger check: every account passes `assertAccountInvariants`, and each
 * account's held funds equal the sum of its deposits currently under dispute.
 */
export function assertLedgerInvariants(store: LedgerStore): void {
  const disputedByClient = new Map<number, Decimal>();
  for (const record of store.depositRecords()) {
    if (record.state !== 'disputed') continue;
    const current = disputedByClient.get(record.clientId) ?? new Decimal(0);
    disputedByClient.set(record.clientId, current.plus(record.amount));
  }

  for (const snapshot of store.snapshot()) {
    const account = store.findAccount(snapshot.clientId);
    if (account) {
      assertAccountInvariants(account);
    }

    const disputed = disputedByClient.get(snapshot.clientId) ?? new Decimal(0);
    if (!snapshot.held.equals(disputed)) {
      throw new LedgerInvariantError(
        `Client ${String(snapshot.clientId)} holds ${snapshot.held.toFixed()} but has ${disputed.toFixed()} under dispute`,
        { additionalContext: { clientId: snapshot.clientId, held: snapshot.held.toFixed(), disputed: disputed.toFixed() } }
      );
    }
  }
}
