import type { CleanedOperation, DropReason, RawOperationRow } from '../entities/ImportedOperation.js';
import { isOperationKind, type OperationKind } from '../entities/Operation.js';
import { parseDate } from './DateParser.js';

const operationNameMapping: Record<string, string> = {
  deposit: 'deposit',
  diposit: 'deposit',
  withdraw: 'withdraw',
  withtraw: 'withdraw',
  interest: 'interest',
};

const requiredFields = ['operation', 'amount', 'balance_after', 'status'] as const;

export interface CleaningOutcome {
  operations: CleanedOperation[];
  rowsForAccount: number;
  dropped: Record<DropReason, number>;
}

export const emptyDropCounts = (): Record<DropReason, number> => ({
  missing_field: 0,
  invalid_number: 0,
  unsupported_operation: 0,
  non_positive_amount: 0,
  unsuccessful_status: 0,
  invalid_date: 0,
});

const isMissing = (value: unknown): boolean =>
  value === undefined ||
  value === null ||
  (typeof value === 'string' && value.trim() === '') ||
  (typeof value === 'number' && Number.isNaN(value));

const decimalLiteral = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$|^[+-]?Infinity$/;

// Decimal notation only: `0x1A`, `0b11` and `0o7` are not numbers here.
export const toNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }

  if (typeof value === 'string' && decimalLiteral.test(value.trim())) {
    return Number(value.trim());
  }

  return null;
};

// Unknown names come back unchanged and fail the allowed-kinds check later.
export const normalizeOperationName = (name: string): string => {
  const lowered = name.toLowerCase();
  return operationNameMapping[lowered] ?? name;
};

export const isSuccessfulStatus = (status: unknown): status is string =>
  typeof status === 'string' && status.toLowerCase().includes('success');

export const belongsToAccount = (row: RawOperationRow, accountNumber: string): boolean => {
  const value = row.account_number;
  return typeof value === 'string' && value.trim() === accountNumber;
};

/**
 * Runs one row through the cleaning stages in order. The first stage that
 * rejects the row decides the drop reason; nothing here throws.
 */
export const cleanOperationRow = (
  row: RawOperationRow,
  allowedKinds: readonly OperationKind[],
): CleanedOperation | DropReason => {
  if (requiredFields.some((field) => isMissing(row[field]))) {
    return 'missing_field';
  }

  const amount = toNumber(row.amount);
  const balanceAfter = toNumber(row.balance_after);
  if (amount === null || balanceAfter === null) {
    return 'invalid_number';
  }

  const operation = row.operation;
  if (typeof operation !== 'string') {
    return 'unsupported_operation';
  }

  const kind = normalizeOperationName(operation);
  if (!isOperationKind(kind) || !allowedKinds.includes(kind)) {
    return 'unsupported_operation';
  }

  if (!(amount > 0)) {
    return 'non_positive_amount';
  }

  const status = row.status;
  if (!isSuccessfulStatus(status)) {
    return 'unsuccessful_status';
  }

  const timestamp = parseDate(row.date);
  if (!timestamp) {
    return 'invalid_date';
  }

  return { kind, amount, balanceAfter, status, timestamp };
};

export const cleanImportedOperations = (
  rows: RawOperationRow[],
  accountNumber: string,
  allowedKinds: readonly OperationKind[],
): CleaningOutcome => {
  const accountRows = rows.filter((row) => belongsToAccount(row, accountNumber));
  const dropped = emptyDropCounts();
  const operations: CleanedOperation[] = [];

  for (const row of accountRows) {
    const result = cleanOperationRow(row, allowedKinds);
    if (typeof result === 'string') {
      dropped[result] += 1;
    } else {
      operations.push(result);
    }
  }

  return { operations, rowsForAccount: accountRows.length, dropped };
};
