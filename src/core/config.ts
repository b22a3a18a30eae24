import { z } from 'zod';
import { ConfigError } from './errors';
import { defaultCacheDbPath } from './paths';
import { readPackageVersion } from './version';

export const DEFAULT_BASE_URL = 'https://oeis.org';
export const DEFAULT_CACHE_TTL_DAYS = 30;

export interface ProbeRuntimeConfig {
  baseUrl: string;
  timeoutMs: number;
  maxQueryTerms: number;
  cacheTtlDays: number;
  /** SQLite file holding cached responses; ':memory:' keeps it in process. */
  cacheDb: string;
  userAgent: string;
}

export function defaultRuntimeConfig(): ProbeRuntimeConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    timeoutMs: 10_000,
    maxQueryTerms: 40,
    cacheTtlDays: DEFAULT_CACHE_TTL_DAYS,
    cacheDb: defaultCacheDbPath(),
    userAgent: `seqprobe/${readPackageVersion()}`,
  };
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  SEQPROBE_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  SEQPROBE_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  SEQPROBE_MAX_QUERY_TERMS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  SEQPROBE_CACHE_TTL_DAYS: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional()),
  SEQPROBE_CACHE_DB: z.preprocess(blankToUndefined, z.string().optional()),
});

export function runtimeConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ProbeRuntimeConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const option = issue ? issue.path.join('.') : 'env';
    throw new ConfigError(option, `invalid environment variable ${option}: ${issue?.message ?? 'invalid value'}`);
  }
  const e = parsed.data;
  return definedOnly({
    baseUrl: e.SEQPROBE_BASE_URL,
    timeoutMs: e.SEQPROBE_TIMEOUT_MS,
    maxQueryTerms: e.SEQPROBE_MAX_QUERY_TERMS,
    cacheTtlDays: e.SEQPROBE_CACHE_TTL_DAYS,
    cacheDb: e.SEQPROBE_CACHE_DB,
  });
}

export type RuntimeOverrides = { [K in keyof ProbeRuntimeConfig]?: ProbeRuntimeConfig[K] | undefined };

function definedOnly(o: RuntimeOverrides): Partial<ProbeRuntimeConfig> {
  const out: Partial<ProbeRuntimeConfig> = {};
  if (o.baseUrl !== undefined) out.baseUrl = o.baseUrl;
  if (o.timeoutMs !== undefined) out.timeoutMs = o.timeoutMs;
  if (o.maxQueryTerms !== undefined) out.maxQueryTerms = o.maxQueryTerms;
  if (o.cacheTtlDays !== undefined) out.cacheTtlDays = o.cacheTtlDays;
  if (o.cacheDb !== undefined) out.cacheDb = o.cacheDb;
  if (o.userAgent !== undefined) out.userAgent = o.userAgent;
  return out;
}

/**
 * Defaults, then environment, then explicit overrides (CLI flags).
 */
export function mergeRuntimeConfig(
  overrides: RuntimeOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ProbeRuntimeConfig {
  return {
    ...defaultRuntimeConfig(),
    ...runtimeConfigFromEnv(env),
    ...definedOnly(overrides),
  };
}
