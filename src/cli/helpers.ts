import fs from 'fs-extra';
import { mergeRuntimeConfig, type ProbeRuntimeConfig, type RuntimeOverrides } from '../core/config';
import type { ProviderMap } from '../core/matching/types';
import { createOeisClient, type CachePolicy, type FetchLike, type OeisClient } from '../core/sources/oeisClient';
import { loadOfflineIndex } from '../core/sources/offlineIndex';
import { createOfflineProvider } from '../core/sources/offline';
import { createOnlineProvider } from '../core/sources/online';
import { SqliteResponseCache, type ResponseCache } from '../core/sources/responseCache';

/**
 * Open the response cache unless the policy bypasses it entirely.
 */
export function openResponseCache(config: ProbeRuntimeConfig, policy: CachePolicy = 'use'): ResponseCache | undefined {
  if (policy === 'bypass') return undefined;
  return new SqliteResponseCache(config.cacheDb);
}

export function buildOeisClient(
  config: ProbeRuntimeConfig,
  cache: ResponseCache | undefined,
  policy: CachePolicy,
  fetchImpl?: FetchLike
): OeisClient {
  return createOeisClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    maxQueryTerms: config.maxQueryTerms,
    userAgent: config.userAgent,
    cacheTtlDays: config.cacheTtlDays,
    cachePolicy: policy,
    ...(cache ? { cache } : {}),
    ...(fetchImpl ? { fetchImpl } : {}),
  });
}

export interface ProviderSetup {
  online: boolean;
  offlineStripped?: string;
  offlineNames?: string;
  offlineMaxScan?: number;
  maxCandidates: number;
  cachePolicy: CachePolicy;
  fetchImpl?: FetchLike;
}

export interface BuiltProviders {
  providers: ProviderMap;
  cache?: ResponseCache;
  offlineEntries?: number;
}

/**
 * Build one provider per enabled source. The offline index is loaded here so
 * dump problems surface before the engine runs.
 */
export async function buildProviders(config: ProbeRuntimeConfig, setup: ProviderSetup): Promise<BuiltProviders> {
  const providers: ProviderMap = {};
  const built: BuiltProviders = { providers };

  if (setup.offlineStripped) {
    const index = await loadOfflineIndex({
      strippedPath: setup.offlineStripped,
      ...(setup.offlineNames ? { namesPath: setup.offlineNames } : {}),
      ...(setup.offlineMaxScan !== undefined ? { maxScan: setup.offlineMaxScan } : {}),
    });
    providers.offline = createOfflineProvider(index, { maxCandidates: setup.maxCandidates });
    built.offlineEntries = index.entries.length;
  }

  if (setup.online) {
    const cache = openResponseCache(config, setup.cachePolicy);
    const client = buildOeisClient(config, cache, setup.cachePolicy, setup.fetchImpl);
    providers.online = createOnlineProvider({ client, maxCandidates: setup.maxCandidates });
    if (cache) built.cache = cache;
  }

  return built;
}

export function resolveRuntimeConfig(overrides: RuntimeOverrides): ProbeRuntimeConfig {
  return mergeRuntimeConfig(overrides);
}

export async function readTermsInput(input: { terms?: string; termsFile?: string }): Promise<string | null> {
  if (input.termsFile) return fs.readFile(input.termsFile, 'utf-8');
  if (input.terms !== undefined && input.terms.trim()) return input.terms;
  return null;
}
