import { z } from 'zod';

export const CacheStatsSchema = z.object({
  cacheDb: z.string().optional(),
});

export const CacheClearSchema = z.object({
  cacheDb: z.string().optional(),
});

export const CachePruneSchema = z.object({
  cacheDb: z.string().optional(),
  ttlDays: z.coerce.number().int().nonnegative().optional(),
});

export type CacheStatsInput = z.infer<typeof CacheStatsSchema>;
export type CacheClearInput = z.infer<typeof CacheClearSchema>;
export type CachePruneInput = z.infer<typeof CachePruneSchema>;
