import { ConfigError, ProviderError } from '../errors';
import { createLogger } from '../log';
import { explainMismatch } from './explain';
import { filterByMatchLen, mergeHits } from './merger';
import { DEFAULT_MAX_HITS, rankHits } from './ranker';
import { DEFAULT_RELAX_MIN_TERMS, relaxQuery } from './relax';
import { scoreCandidate } from './scorer';
import {
  RANK_POLICIES,
  SOURCE_KINDS,
  type ProbeOptions,
  type ProbeOutcome,
  type ProviderMap,
  type Query,
  type RankPolicy,
  type ScoredHit,
  type SourceFailure,
  type SourceKind,
} from './types';

const log = createLogger({ component: 'matching', kind: 'engine' });

export interface ResolvedProbeOptions {
  maxHits: number;
  rank: RankPolicy;
  minMatchLen: number;
  relax: boolean;
  relaxMinTerms: number;
  relaxMaxSteps?: number;
  explain: boolean;
  sources: SourceKind[];
  strictProviders: boolean;
}

function isNonNegativeInt(v: number): boolean {
  return Number.isInteger(v) && v >= 0;
}

/**
 * Resolve defaults and reject invalid tunables before any lookup happens.
 */
export function validateProbeOptions(providers: ProviderMap, options: ProbeOptions = {}): ResolvedProbeOptions {
  const maxHits = options.maxHits ?? DEFAULT_MAX_HITS;
  if (!Number.isInteger(maxHits) || maxHits <= 0) {
    throw new ConfigError('maxHits', `maxHits must be a positive integer, got ${String(maxHits)}`, maxHits);
  }

  const minMatchLen = options.minMatchLen ?? 0;
  if (!isNonNegativeInt(minMatchLen)) {
    throw new ConfigError('minMatchLen', `minMatchLen must be a non-negative integer, got ${String(minMatchLen)}`, minMatchLen);
  }

  const rank = options.rank ?? 'strict';
  if (!RANK_POLICIES.includes(rank)) {
    throw new ConfigError('rank', `unknown rank policy '${String(rank)}'`, rank);
  }

  const relaxMinTerms = options.relaxMinTerms ?? DEFAULT_RELAX_MIN_TERMS;
  if (!Number.isInteger(relaxMinTerms) || relaxMinTerms <= 0) {
    throw new ConfigError('relaxMinTerms', `relaxMinTerms must be a positive integer, got ${String(relaxMinTerms)}`, relaxMinTerms);
  }
  if (options.relaxMaxSteps !== undefined && !isNonNegativeInt(options.relaxMaxSteps)) {
    throw new ConfigError('relaxMaxSteps', `relaxMaxSteps must be a non-negative integer, got ${String(options.relaxMaxSteps)}`, options.relaxMaxSteps);
  }

  const requested = options.sources ?? SOURCE_KINDS.filter((s) => providers[s] !== undefined);
  const sources = Array.from(new Set(requested));
  if (sources.length === 0) {
    throw new ConfigError('sources', 'at least one source (online or offline) must be enabled', sources);
  }
  for (const source of sources) {
    if (!SOURCE_KINDS.includes(source)) {
      throw new ConfigError('sources', `unknown source '${String(source)}'`, source);
    }
    if (!providers[source]) {
      throw new ConfigError('sources', `source '${source}' is enabled but has no provider`, source);
    }
  }

  return {
    maxHits,
    rank,
    minMatchLen,
    relax: options.relax ?? false,
    relaxMinTerms,
    ...(options.relaxMaxSteps !== undefined ? { relaxMaxSteps: options.relaxMaxSteps } : {}),
    explain: options.explain ?? false,
    sources,
    strictProviders: options.strictProviders ?? false,
  };
}

function toFailure(source: SourceKind, reason: unknown, dropped: number): SourceFailure {
  if (reason instanceof ProviderError) {
    return { source, kind: reason.kind, message: reason.message, dropped };
  }
  return { source, kind: 'unknown', message: reason instanceof Error ? reason.message : String(reason), dropped };
}

/**
 * Query every active source, score their candidates and merge them into one
 * filtered set. All lookups settle before merging starts.
 */
async function runPass(
  query: Query,
  dropped: number,
  providers: ProviderMap,
  opts: ResolvedProbeOptions,
  failures: SourceFailure[]
): Promise<ScoredHit[]> {
  const active = opts.sources.flatMap((source) => {
    const provider = providers[source];
    return provider ? [{ source, provider }] : [];
  });
  const settled = await Promise.allSettled(active.map(({ provider }) => provider.lookup(query)));

  const streams: ScoredHit[][] = [];
  settled.forEach((res, i) => {
    const entry = active[i];
    if (!entry) return;
    if (res.status === 'fulfilled') {
      streams.push(res.value.map((c) => scoreCandidate(query, c, entry.source)));
      return;
    }
    if (opts.strictProviders) throw res.reason;
    const failure = toFailure(entry.source, res.reason, dropped);
    log.warn('source_failed', { source: failure.source, kind: failure.kind, message: failure.message, dropped });
    failures.push(failure);
  });

  const merged = mergeHits(...streams);
  const filtered = filterByMatchLen(merged, opts.minMatchLen);
  log.debug('pass', {
    query_len: query.length,
    dropped,
    candidates: streams.reduce((n, s) => n + s.length, 0),
    merged: merged.length,
    kept: filtered.length,
  });
  return filtered;
}

/**
 * Identify which catalogued sequences the query most plausibly matches.
 */
export async function probe(query: Query, providers: ProviderMap, options: ProbeOptions = {}): Promise<ProbeOutcome> {
  const opts = validateProbeOptions(providers, options);
  const sourceErrors: SourceFailure[] = [];

  let hits = await runPass(query, 0, providers, opts, sourceErrors);
  let effectiveQuery = query;
  let dropped = 0;
  const relaxation = { enabled: opts.relax, attempts: 0, exhausted: false };

  if (hits.length === 0 && opts.relax) {
    const relaxed = await relaxQuery(
      query,
      (shortened, n) => runPass(shortened, n, providers, opts, sourceErrors),
      { minTerms: opts.relaxMinTerms, ...(opts.relaxMaxSteps !== undefined ? { maxSteps: opts.relaxMaxSteps } : {}) }
    );
    hits = relaxed.hits;
    effectiveQuery = relaxed.query;
    dropped = relaxed.dropped;
    relaxation.attempts = relaxed.attempts;
    relaxation.exhausted = relaxed.exhausted;
  }

  const ranked = rankHits(hits, opts.rank, opts.maxHits);
  const top = ranked[0];
  const explanation = opts.explain && top ? explainMismatch(query, top.terms) : null;

  return {
    query,
    effectiveQuery,
    hits: ranked,
    dropped,
    relaxation,
    explanation,
    sourceErrors,
  };
}
