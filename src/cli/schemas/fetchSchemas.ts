import { z } from 'zod';

export const FetchSchema = z.object({
  id: z.string().min(1, 'A-number is required'),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  cacheDb: z.string().optional(),
  cacheTtlDays: z.coerce.number().int().nonnegative().optional(),
  cache: z.enum(['use', 'refresh', 'bypass']).default('use'),
});

export type FetchInput = z.infer<typeof FetchSchema>;
