import { defineHandler, type HandlerRegistration } from './types';
import { ProbeSchema } from './schemas/probeSchemas';
import { FetchSchema } from './schemas/fetchSchemas';
import { CacheClearSchema, CachePruneSchema, CacheStatsSchema } from './schemas/cacheSchemas';
import { handleProbe } from './handlers/probeHandlers';
import { handleFetch } from './handlers/fetchHandlers';
import { handleCacheClear, handleCachePrune, handleCacheStats } from './handlers/cacheHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Command keys follow the pattern:
 * - Top-level commands: 'probe', 'fetch'
 * - Subcommands: 'cache:clear'
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  'probe': defineHandler(ProbeSchema, (input) => handleProbe(input)),
  'fetch': defineHandler(FetchSchema, (input) => handleFetch(input)),
  // Cache subcommands
  'cache:stats': defineHandler(CacheStatsSchema, handleCacheStats),
  'cache:clear': defineHandler(CacheClearSchema, handleCacheClear),
  'cache:prune': defineHandler(CachePruneSchema, handleCachePrune),
};
