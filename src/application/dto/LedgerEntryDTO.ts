import { z } from 'zod';
import type { OperationRecord } from '../../domain/entities/Operation.js';

export const LedgerEntrySchema = z.object({
  opType: z.enum(['deposit', 'withdraw', 'interest']),
  amount: z.number(),
  timestamp: z.string(),
  balanceAfter: z.number(),
  status: z.string(),
});

export type LedgerEntryDTO = z.infer<typeof LedgerEntrySchema>;

export const toLedgerEntryDTO = (record: OperationRecord): LedgerEntryDTO => ({
  opType: record.kind,
  amount: record.amount,
  timestamp: record.timestamp.toISOString(),
  balanceAfter: record.balanceAfter,
  status: record.status,
});
