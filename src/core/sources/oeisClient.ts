import { sha256Hex } from '../crypto';
import { ParseError, ProviderError } from '../errors';
import { createLogger } from '../log';
import { formatQuery } from '../matching/query';
import type { Query } from '../matching/types';
import { isCatalogId, OeisSearchPayloadSchema, type OeisSearchPayload } from './payload';
import type { ResponseCache } from './responseCache';

/** `use` reads and writes, `refresh` only writes, `bypass` skips the cache. */
export type CachePolicy = 'use' | 'refresh' | 'bypass';

export const CACHE_POLICIES: readonly CachePolicy[] = ['use', 'refresh', 'bypass'];

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText?: string;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal }
) => Promise<FetchResponseLike>;

export interface OeisClientOptions {
  baseUrl: string;
  timeoutMs: number;
  maxQueryTerms: number;
  userAgent: string;
  cache?: ResponseCache;
  cacheTtlDays: number;
  cachePolicy: CachePolicy;
  fetchImpl?: FetchLike;
}

export interface OeisResponse {
  url: string;
  payload: OeisSearchPayload;
  fromCache: boolean;
}

export interface OeisClient {
  searchUrl(query: Query): string;
  search(query: Query): Promise<OeisResponse>;
  fetchById(identifier: string): Promise<OeisResponse>;
}

const log = createLogger({ component: 'sources', kind: 'oeis_client' });

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/** Commas stay literal so the query reads like the catalog's own syntax. */
function encodeQueryParam(q: string): string {
  return encodeURIComponent(q).replace(/%2C/gi, ',');
}

export function normalizeCatalogId(raw: string): string {
  const id = String(raw ?? '').trim().toUpperCase();
  if (!isCatalogId(id)) throw new ParseError(`expected an A-number like A000045, got '${raw}'`, raw);
  return id;
}

function decodePayload(text: string, url: string): OeisSearchPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ProviderError('online', 'malformed', `response from ${url} is not JSON`, {
      cause: e instanceof Error ? e.message : String(e),
    });
  }
  const parsed = OeisSearchPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError('online', 'malformed', `unexpected response shape from ${url}`, {
      issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

export function createOeisClient(options: OeisClientOptions): OeisClient {
  const baseUrl = trimSlash(options.baseUrl);
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));

  const networkFailure = (e: unknown, url: string): ProviderError => {
    const timedOut = e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError');
    const message = timedOut
      ? `request to ${url} timed out after ${options.timeoutMs}ms`
      : `request to ${url} failed: ${e instanceof Error ? e.message : String(e)}`;
    return new ProviderError('online', 'network', message, { url });
  };

  async function httpGet(url: string): Promise<string> {
    let res: FetchResponseLike;
    try {
      res = await fetchImpl(url, {
        method: 'GET',
        headers: { 'User-Agent': options.userAgent, Accept: 'application/json' },
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (e) {
      throw networkFailure(e, url);
    }
    if (res.status === 429) {
      throw new ProviderError('online', 'rate_limited', `rate limited by ${baseUrl} (HTTP 429)`, { url, status: 429 });
    }
    if (!res.ok) {
      const status = `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`;
      throw new ProviderError('online', 'network', `request to ${url} failed with ${status}`, { url, status: res.status });
    }
    // body reads can time out or reset too
    try {
      return await res.text();
    } catch (e) {
      throw networkFailure(e, url);
    }
  }

  async function cachedGet(url: string): Promise<OeisResponse> {
    const key = sha256Hex(`GET:${url}`);
    const cache = options.cachePolicy === 'bypass' ? undefined : options.cache;

    if (cache && options.cachePolicy === 'use') {
      const cached = cache.get(key, options.cacheTtlDays);
      if (cached !== undefined) {
        try {
          return { url, payload: decodePayload(cached, url), fromCache: true };
        } catch (e) {
          log.warn('cache_entry_unreadable', { url, err: e instanceof Error ? e.message : String(e) });
        }
      }
    }

    const text = await httpGet(url);
    const payload = decodePayload(text, url);
    if (cache) cache.put(key, text);
    return { url, payload, fromCache: false };
  }

  const searchUrl = (query: Query) =>
    `${baseUrl}/search?q=${encodeQueryParam(formatQuery(query, options.maxQueryTerms))}&fmt=json`;

  return {
    searchUrl,
    search: (query) => cachedGet(searchUrl(query)),
    fetchById: async (identifier) => {
      const id = normalizeCatalogId(identifier);
      return cachedGet(`${baseUrl}/search?q=${encodeQueryParam(`id:${id}`)}&fmt=json`);
    },
  };
}
