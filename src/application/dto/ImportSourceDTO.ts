import { z } from 'zod';

export const ImportSourceSchema = z.object({
  fileName: z.string().min(1),
  content: z.union([z.string(), z.instanceof(Buffer)]),
});

export type ImportSourceDTO = z.infer<typeof ImportSourceSchema>;

// JSON histories are a list of flat records; field values are checked row by row later.
export const JsonHistorySchema = z.array(z.record(z.unknown()));
