import { createLogger } from '../../core/log';
import { SqliteResponseCache } from '../../core/sources/responseCache';
import { resolveRuntimeConfig } from '../helpers';
import type { CacheClearInput, CachePruneInput, CacheStatsInput } from '../schemas/cacheSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, errorFromException } from '../types';

const cliLog = createLogger({ component: 'cli' });

function withCache<T>(cacheDb: string, fn: (cache: SqliteResponseCache) => T): T {
  const cache = new SqliteResponseCache(cacheDb);
  try {
    return fn(cache);
  } finally {
    cache.close();
  }
}

export async function handleCacheStats(input: CacheStatsInput): Promise<CLIResult | CLIError> {
  const log = cliLog.child({ cmd: 'cache:stats' });
  try {
    const config = resolveRuntimeConfig({ cacheDb: input.cacheDb });
    const entries = withCache(config.cacheDb, (c) => c.count());
    log.info('cache_stats', { ok: true, cacheDb: config.cacheDb, entries });
    return success({ cacheDb: config.cacheDb, entries, ttlDays: config.cacheTtlDays });
  } catch (e) {
    return errorFromException(e);
  }
}

export async function handleCacheClear(input: CacheClearInput): Promise<CLIResult | CLIError> {
  const log = cliLog.child({ cmd: 'cache:clear' });
  try {
    const config = resolveRuntimeConfig({ cacheDb: input.cacheDb });
    const removed = withCache(config.cacheDb, (c) => c.clear());
    log.info('cache_clear', { ok: true, cacheDb: config.cacheDb, removed });
    return success({ cacheDb: config.cacheDb, removed });
  } catch (e) {
    return errorFromException(e);
  }
}

export async function handleCachePrune(input: CachePruneInput): Promise<CLIResult | CLIError> {
  const log = cliLog.child({ cmd: 'cache:prune' });
  try {
    const config = resolveRuntimeConfig({ cacheDb: input.cacheDb, cacheTtlDays: input.ttlDays });
    const removed = withCache(config.cacheDb, (c) => c.prune(config.cacheTtlDays));
    log.info('cache_prune', { ok: true, cacheDb: config.cacheDb, ttlDays: config.cacheTtlDays, removed });
    return success({ cacheDb: config.cacheDb, ttlDays: config.cacheTtlDays, removed });
  } catch (e) {
    return errorFromException(e);
  }
}
