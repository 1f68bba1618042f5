import { describe, expect, test } from 'vitest';
import {
  belongsToAccount,
  cleanImportedOperations,
  cleanOperationRow,
  isSuccessfulStatus,
  normalizeOperationName,
  toNumber,
} from '../../src/domain/services/OperationCleaner.js';

const allKinds = ['deposit', 'withdraw', 'interest'] as const;

const row = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  date: '2025-01-01 10:00',
  account_number: 'ACC-5000',
  operation: 'deposit',
  amount: '50',
  balance_after: '150',
  status: 'success',
  ...overrides,
});

describe('normalizeOperationName', () => {
  test('maps known names and misspellings case-insensitively', () => {
    expect(normalizeOperationName('Diposit')).toBe('deposit');
    expect(normalizeOperationName('WITHTRAW')).toBe('withdraw');
    expect(normalizeOperationName('Interest')).toBe('interest');
  });

  test('returns unknown names unchanged', () => {
    expect(normalizeOperationName('Transfer')).toBe('Transfer');
  });
});

describe('toNumber', () => {
  test('reads numbers and numeric strings', () => {
    expect(toNumber(12.5)).toBe(12.5);
    expect(toNumber(' 40 ')).toBe(40);
    expect(toNumber('-5')).toBe(-5);
    expect(toNumber('Infinity')).toBe(Number.POSITIVE_INFINITY);
  });

  test('reads decimal fractions and exponents', () => {
    expect(toNumber('.5')).toBe(0.5);
    expect(toNumber('+3.')).toBe(3);
    expect(toNumber('1e3')).toBe(1000);
    expect(toNumber('2.5E-1')).toBe(0.25);
  });

  test('refuses hex, binary and octal literals', () => {
    expect(toNumber('0x1A')).toBeNull();
    expect(toNumber('0b11')).toBeNull();
    expect(toNumber('0o7')).toBeNull();
    expect(toNumber('infinity')).toBeNull();
  });

  test('returns null for anything else', () => {
    expect(toNumber('12abc')).toBeNull();
    expect(toNumber('')).toBeNull();
    expect(toNumber(Number.NaN)).toBeNull();
    expect(toNumber(true)).toBeNull();
    expect(toNumber(undefined)).toBeNull();
  });
});

describe('isSuccessfulStatus', () => {
  test('matches any string containing "success"', () => {
    expect(isSuccessfulStatus('SUCCESS')).toBe(true);
    expect(isSuccessfulStatus('completed successfully')).toBe(true);
    expect(isSuccessfulStatus('failed')).toBe(false);
    expect(isSuccessfulStatus(1)).toBe(false);
  });
});

describe('belongsToAccount', () => {
  test('compares the trimmed account number', () => {
    expect(belongsToAccount(row({ account_number: ' ACC-5000 ' }), 'ACC-5000')).toBe(true);
    expect(belongsToAccount(row({ account_number: 'ACC-50001' }), 'ACC-5000')).toBe(false);
    expect(belongsToAccount(row({ account_number: 5000 }), 'ACC-5000')).toBe(false);
  });
});

describe('cleanOperationRow', () => {
  test('returns a cleaned operation for a valid row', () => {
    expect(cleanOperationRow(row({ operation: 'Diposit', status: 'SUCCESS' }), allKinds)).toEqual({
      kind: 'deposit',
      amount: 50,
      balanceAfter: 150,
      status: 'SUCCESS',
      timestamp: new Date(2025, 0, 1, 10, 0),
    });
  });

  test.each([
    ['a missing amount', { amount: undefined }, 'missing_field'],
    ['a blank status', { status: '  ' }, 'missing_field'],
    ['a null operation', { operation: null }, 'missing_field'],
    ['a non-numeric balance', { balance_after: 'n/a' }, 'invalid_number'],
    ['a hexadecimal amount', { amount: '0x1A' }, 'invalid_number'],
    ['a non-string operation', { operation: 7 }, 'unsupported_operation'],
    ['an unknown operation', { operation: 'transfer' }, 'unsupported_operation'],
    ['a zero amount', { amount: '0' }, 'non_positive_amount'],
    ['a negative amount', { amount: -5 }, 'non_positive_amount'],
    ['a failed status', { status: 'failed' }, 'unsuccessful_status'],
    ['an unsupported date layout', { date: '2025/01/10 10:00' }, 'invalid_date'],
    ['a missing date', { date: undefined }, 'invalid_date'],
  ])('drops %s', (_label, overrides, reason) => {
    expect(cleanOperationRow(row(overrides), allKinds)).toBe(reason);
  });

  test('drops kinds the account does not accept', () => {
    expect(cleanOperationRow(row({ operation: 'interest' }), ['deposit', 'withdraw'])).toBe('unsupported_operation');
  });

  test('keeps an infinite balance for the commit step to reject', () => {
    const result = cleanOperationRow(row({ balance_after: 'Infinity' }), allKinds);

    expect(result).toMatchObject({ balanceAfter: Number.POSITIVE_INFINITY });
  });
});

describe('cleanImportedOperations', () => {
  test('filters by account and counts every drop reason', () => {
    const rows = [
      row(),
      row({ account_number: 'ACC-6000' }),
      row({ amount: '-1' }),
      row({ status: 'pending' }),
      row({ operation: 'withtraw', amount: '20', balance_after: '130', date: '02.01.2025 09:30:00' }),
    ];

    const outcome = cleanImportedOperations(rows, 'ACC-5000', allKinds);

    expect(outcome.rowsForAccount).toBe(4);
    expect(outcome.operations.map((operation) => operation.kind)).toEqual(['deposit', 'withdraw']);
    expect(outcome.dropped).toEqual({
      missing_field: 0,
      invalid_number: 0,
      unsupported_operation: 0,
      non_positive_amount: 1,
      unsuccessful_status: 1,
      invalid_date: 0,
    });
  });
});
