import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_TYPES, type TransactionEvent } from '../types/transaction-event.js';
import {
  AMOUNT_DECIMAL_PLACES,
  AMOUNT_INTEGER_DIGITS,
  exceedsAmountMagnitude,
  exceedsAmountPrecision,
  parseDecimal,
  tryParseDecimal,
} from '../utils/decimal-utils.js';

// Transaction type - case-insensitive on input, normalized to lowercase
export const TransactionTypeSchema = z.string().trim().toLowerCase().pipe(z.enum(TRANSACTION_TYPES));

function unsignedIntegerSchema(field: string, max: number) {
  return z
    .string({ required_error: `${field} is required` })
    .trim()
    .regex(/^\d+$/, { message: `${field} must be an unsigned integer` })
    .transform((val) => Number(val))
    .pipe(z.number().int().max(max, { message: `${field} must not exceed ${String(max)}` }));
}

export const ClientIdSchema = unsignedIntegerSchema('client', MAX_CLIENT_ID);
export const TransactionIdSchema = unsignedIntegerSchema('tx', MAX_TX_ID);

/**
 * Parse the amount column of a deposit or withdrawal row.
 * The sign is kept: rejecting non-positive amounts is the engine's decision.
 */
export function parseAmount(raw: string | undefined): Result<Decimal, string> {
  const trimmed = raw?.trim() ?? '';
  if (trimmed === '') {
    return err('amount is required');
  }

  if (!tryParseDecimal(trimmed)) {
    return err(`amount "${trimmed}" is not a decimal number`);
  }

  const amount = parseDecimal(trimmed);
  if (exceedsAmountPrecision(amount)) {
    return err(`amount "${trimmed}" has more than ${String(AMOUNT_DECIMAL_PLACES)} decimal places`);
  }

  if (exceedsAmountMagnitude(amount)) {
    return err(`amount "${trimmed}" has more than ${String(AMOUNT_INTEGER_DIGITS)} integer digits`);
  }

  return ok(amount);
}

/**
 * One CSV row (`type,client,tx,amount`, all strings) to a typed transaction event.
 * The amount column is ignored for dispute, resolve and chargeback rows.
 */
export const TransactionRowSchema = z
  .object({
    type: TransactionTypeSchema,
    client: ClientIdSchema,
    tx: TransactionIdSchema,
    amount: z.string().optional(),
  })
  .transform((row, ctx): TransactionEvent => {
    switch (row.type) {
      case 'deposit':
      case 'withdrawal': {
        const amount = parseAmount(row.amount);
        if (amount.isErr()) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: amount.error, path: ['amount'] });
          return z.NEVER;
        }
        return { type: row.type, client: row.client, tx: row.tx, amount: amount.value };
      }
      case 'dispute':
      case 'resolve':
      case 'chargeback':
        return { type: row.type, client: row.client, tx: row.tx };
    }
  });
