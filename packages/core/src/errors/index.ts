/**
 * Error hierarchy for ledger processing.
 *
 * Precondition failures on individual events are not errors: the engine reports
 * them as rejected outcomes. These classes cover malformed input, duplicate
 * records and defects in the ledger itself.
 */

interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  transactionId?: number | undefined;
}

/**
 * Base domain error for transaction processing
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly transactionId?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.transactionId = context?.transactionId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
      transactionId: this.transactionId,
    };
  }
}

/**
 * An input row that does not describe a valid transaction event.
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'warning' as const;

  constructor(
    message: string,
    public readonly issues: string[],
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * A deposit reusing a transaction id that is already recorded.
 */
export class DuplicateTransactionError extends DomainError {
  readonly code = 'DUPLICATE_TRANSACTION';
  readonly severity = 'warning' as const;

  constructor(txId: number) {
    super(`Transaction ${String(txId)} is already recorded`, { transactionId: txId });
  }
}

/**
 * Account state broke a ledger invariant. Unreachable when preconditions hold;
 * seeing one means a defect, so it is thrown rather than reported as a rejection.
 */
export class LedgerInvariantError extends DomainError {
  readonly code = 'LEDGER_INVARIANT_VIOLATION';
  readonly severity = 'error' as const;
}
