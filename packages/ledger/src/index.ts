export { LedgerStore } from './ledger-store.js';
export { TransactionEngine, type TransactionEngineOptions } from './transaction-engine.js';
export { DISPUTE_TRANSITIONS } from './transaction-engine-utils.js';
export { assertAccountInvariants, assertLedgerInvariants } from './invariants.js';
export * from './types.js';
