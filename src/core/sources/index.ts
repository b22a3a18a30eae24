export { createOnlineProvider } from './online';
export type { OnlineProviderOptions } from './online';
export { createOfflineProvider, queryNeedle } from './offline';
export type { OfflineProviderOptions } from './offline';
export { loadOfflineIndex, loadNames, parseStrippedLine, parseNamesLine, normalizeTermLine } from './offlineIndex';
export type { OfflineIndex, OfflineEntry, LoadOfflineIndexOptions } from './offlineIndex';
export { createOeisClient, normalizeCatalogId, CACHE_POLICIES } from './oeisClient';
export type { OeisClient, OeisClientOptions, OeisResponse, CachePolicy, FetchLike, FetchResponseLike } from './oeisClient';
export {
  candidatesFromPayload,
  entryToCandidate,
  entryIdentifier,
  formatCatalogId,
  isCatalogId,
  OeisSearchPayloadSchema,
  DEFAULT_MAX_CANDIDATES,
  MAX_DATA_TERMS,
} from './payload';
export type { OeisEntry, OeisSearchPayload } from './payload';
export { SqliteResponseCache, MemoryResponseCache } from './responseCache';
export type { ResponseCache, Clock } from './responseCache';
