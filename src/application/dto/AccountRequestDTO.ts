import { z } from 'zod';

export const OpenAccountSchema = z.object({
  type: z.enum(['checking', 'savings']),
  holder: z.string(),
  balance: z.number().nonnegative().optional(),
  accountNumber: z.union([z.string(), z.number().int()]).optional(),
});

export type OpenAccountDTO = z.infer<typeof OpenAccountSchema>;

export const AmountRequestSchema = z.object({
  amount: z.number(),
});

export type AmountRequestDTO = z.infer<typeof AmountRequestSchema>;

export const InterestRequestSchema = z.object({
  rate: z.number(),
});

export type InterestRequestDTO = z.infer<typeof InterestRequestSchema>;

export const TopOperationsQuerySchema = z.object({
  count: z.coerce.number().int().nonnegative().default(5),
  sortBy: z.string().default('amount'),
});

export type TopOperationsQueryDTO = z.infer<typeof TopOperationsQuerySchema>;
