import { z } from 'zod';

export const ChartPointSchema = z.object({
  timestamp: z.string(),
  label: z.string(),
  balance: z.number(),
  annotation: z.string(),
  color: z.enum(['green', 'red', 'blue']),
});

export type ChartPointDTO = z.infer<typeof ChartPointSchema>;

export const BalanceChartSchema = z.object({
  title: z.string(),
  xLabel: z.string(),
  yLabel: z.string(),
  points: z.array(ChartPointSchema),
});

export type BalanceChartDTO = z.infer<typeof BalanceChartSchema>;
