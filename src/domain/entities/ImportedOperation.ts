import type { OperationKind } from './Operation.js';

// A row exactly as read from an external history file; nothing about its values is trusted.
export type RawOperationRow = Record<string, unknown>;

export interface CleanedOperation {
  kind: OperationKind;
  amount: number;
  balanceAfter: number;
  status: string;
  timestamp: Date;
}

export type DropReason =
  | 'missing_field'
  | 'invalid_number'
  | 'unsupported_operation'
  | 'non_positive_amount'
  | 'unsuccessful_status'
  | 'invalid_date';

export interface ImportReport {
  accountNumber: string;
  rowsRead: number;
  rowsForAccount: number;
  rowsImported: number;
  dropped: Record<DropReason, number>;
  finalBalance: number;
}
