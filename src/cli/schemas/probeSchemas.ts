import { z } from 'zod';

const rankEnum = z.enum(['strict', 'prefer-early']);
const cachePolicyEnum = z.enum(['use', 'refresh', 'bypass']);

// Ranges for maxHits / minMatchLen are checked by the engine so they surface as config errors.
export const ProbeSchema = z.object({
  terms: z.string().optional(),
  termsFile: z.string().optional(),
  maxHits: z.coerce.number().int().default(10),
  rank: rankEnum.default('strict'),
  minMatchLen: z.coerce.number().int().default(0),
  relax: z.boolean().default(false),
  relaxMinTerms: z.coerce.number().int().default(3),
  relaxMaxSteps: z.coerce.number().int().optional(),
  explainTop: z.boolean().default(false),
  online: z.boolean().default(true),
  offlineStripped: z.string().optional(),
  offlineNames: z.string().optional(),
  offlineMaxScan: z.coerce.number().int().positive().optional(),
  strictProviders: z.boolean().default(false),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  maxQueryTerms: z.coerce.number().int().positive().optional(),
  cacheDb: z.string().optional(),
  cacheTtlDays: z.coerce.number().int().nonnegative().optional(),
  cache: cachePolicyEnum.default('use'),
  jsonOut: z.string().optional(),
  json: z.boolean().default(false),
});

export type ProbeInput = z.infer<typeof ProbeSchema>;
