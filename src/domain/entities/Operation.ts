export const OPERATION_KINDS = ['deposit', 'withdraw', 'interest'] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export type OperationStatus = 'success' | 'fail';

export interface OperationRecord {
  kind: OperationKind;
  amount: number;
  timestamp: Date;
  balanceAfter: number;
  // 'success' | 'fail' for live operations; imported rows keep the source literal
  status: string;
}

export const isOperationKind = (value: string): value is OperationKind =>
  (OPERATION_KINDS as readonly string[]).includes(value);
