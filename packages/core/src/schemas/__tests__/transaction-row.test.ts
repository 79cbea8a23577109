import { describe, expect, it } from 'vitest';

import { formatZodIssues, fromZod } from '../../utils/zod-utils.js';
import { parseAmount, TransactionRowSchema } from '../transaction-row.js';

describe('TransactionRowSchema', () => {
  it('should parse a deposit row', () => {
    const result = fromZod(TransactionRowSchema, { type: 'deposit', client: '1', tx: '1', amount: '1.5' });

    expect(result.isOk()).toBe(true);
    const event = result._unsafeUnwrap();
    expect(event.type).toBe('deposit');
    expect(event.client).toBe(1);
    expect(event.tx).toBe(1);
    expect('amount' in event && event.amount.toString()).toBe('1.5');
  });

  it('should accept the type case-insensitively and trim fields', () => {
    const result = fromZod(TransactionRowSchema, { type: ' Withdrawal ', client: ' 2 ', tx: '5 ', amount: ' 3.0 ' });

    const event = result._unsafeUnwrap();
    expect(event.type).toBe('withdrawal');
    expect(event.client).toBe(2);
    expect(event.tx).toBe(5);
  });

  it('should ignore the amount column for dispute, resolve and chargeback', () => {
    for (const type of ['dispute', 'resolve', 'chargeback']) {
      const event = fromZod(TransactionRowSchema, { type, client: '1', tx: '9', amount: '42' })._unsafeUnwrap();

      expect(event).toEqual({ type, client: 1, tx: 9 });
    }
  });

  it('should accept a dispute row without an amount column', () => {
    const event = fromZod(TransactionRowSchema, { type: 'DISPUTE', client: '3', tx: '4' })._unsafeUnwrap();

    expect(event).toEqual({ type: 'dispute', client: 3, tx: 4 });
  });

  it('should reject an unknown type', () => {
    const result = fromZod(TransactionRowSchema, { type: 'transfer', client: '1', tx: '1', amount: '1' });

    expect(result.isErr()).toBe(true);
    expect(formatZodIssues(result._unsafeUnwrapErr())[0]).toMatch(/^type: /);
  });

  it('should reject a deposit without an amount', () => {
    const result = fromZod(TransactionRowSchema, { type: 'deposit', client: '1', tx: '1', amount: '' });

    expect(formatZodIssues(result._unsafeUnwrapErr())).toEqual(['amount: amount is required']);
  });

  it('should reject an amount too large to keep its fractional digits', () => {
    const result = fromZod(TransactionRowSchema, {
      type: 'deposit',
      client: '1',
      tx: '1',
      amount: '123456789012345678901234567.1234',
    });

    expect(formatZodIssues(result._unsafeUnwrapErr())).toEqual([
      'amount: amount "123456789012345678901234567.1234" has more than 20 integer digits',
    ]);
  });

  it('should accept the largest amount with twenty integer digits', () => {
    const event = fromZod(TransactionRowSchema, {
      type: 'deposit',
      client: '1',
      tx: '1',
      amount: '99999999999999999999.9999',
    })._unsafeUnwrap();

    expect('amount' in event && event.amount.toFixed(4)).toBe('99999999999999999999.9999');
  });

  it('should reject an amount with more than four decimal places', () => {
    const result = fromZod(TransactionRowSchema, { type: 'withdrawal', client: '1', tx: '1', amount: '0.12345' });

    expect(formatZodIssues(result._unsafeUnwrapErr())).toEqual([
      'amount: amount "0.12345" has more than 4 decimal places',
    ]);
  });

  it('should reject signed or fractional identifiers', () => {
    const negative = fromZod(TransactionRowSchema, { type: 'deposit', client: '-1', tx: '1', amount: '1' });
    const fractional = fromZod(TransactionRowSchema, { type: 'deposit', client: '1', tx: '1.5', amount: '1' });

    expect(formatZodIssues(negative._unsafeUnwrapErr())).toEqual(['client: client must be an unsigned integer']);
    expect(formatZodIssues(fractional._unsafeUnwrapErr())).toEqual(['tx: tx must be an unsigned integer']);
  });

  it('should reject identifiers out of range', () => {
    const client = fromZod(TransactionRowSchema, { type: 'deposit', client: '65536', tx: '1', amount: '1' });
    const tx = fromZod(TransactionRowSchema, { type: 'deposit', client: '1', tx: '4294967296', amount: '1' });

    expect(formatZodIssues(client._unsafeUnwrapErr())).toEqual(['client: client must not exceed 65535']);
    expect(formatZodIssues(tx._unsafeUnwrapErr())).toEqual(['tx: tx must not exceed 4294967295']);
  });

  it('should accept the largest identifiers', () => {
    const event = fromZod(TransactionRowSchema, {
      type: 'deposit',
      client: '65535',
      tx: '4294967295',
      amount: '1',
    })._unsafeUnwrap();

    expect(event.client).toBe(65_535);
    expect(event.tx).toBe(4_294_967_295);
  });
});

describe('parseAmount', () => {
  it('should keep the sign for the engine to judge', () => {
    expect(parseAmount('-5')._unsafeUnwrap().toString()).toBe('-5');
    expect(parseAmount('0')._unsafeUnwrap().isZero()).toBe(true);
  });

  it('should reject missing and non-numeric amounts', () => {
    expect(parseAmount(undefined)._unsafeUnwrapErr()).toBe('amount is required');
    expect(parseAmount('  ')._unsafeUnwrapErr()).toBe('amount is required');
    expect(parseAmount('ten')._unsafeUnwrapErr()).toBe('amount "ten" is not a decimal number');
  });
});
