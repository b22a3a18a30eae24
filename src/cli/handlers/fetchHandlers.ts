import { createLogger } from '../../core/log';
import { payloadEntries } from '../../core/sources/payload';
import type { FetchLike } from '../../core/sources/oeisClient';
import { buildOeisClient, openResponseCache, resolveRuntimeConfig } from '../helpers';
import type { FetchInput } from '../schemas/fetchSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, errorFromException } from '../types';

export async function handleFetch(input: FetchInput, deps: { fetchImpl?: FetchLike } = {}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'fetch' });

  try {
    return await log.span('fetch', { id: input.id }, async () => {
      const config = resolveRuntimeConfig({
        baseUrl: input.baseUrl,
        timeoutMs: input.timeoutMs,
        cacheDb: input.cacheDb,
        cacheTtlDays: input.cacheTtlDays,
      });
      const cache = openResponseCache(config, input.cache);
      try {
        const client = buildOeisClient(config, cache, input.cache, deps.fetchImpl);
        const res = await client.fetchById(input.id);
        log.debug('fetched', { url: res.url, from_cache: res.fromCache, results: payloadEntries(res.payload).length });
        return success({ id: input.id.trim().toUpperCase(), url: res.url, from_cache: res.fromCache, payload: res.payload });
      } finally {
        cache?.close();
      }
    });
  } catch (e) {
    return errorFromException(e);
  }
}
