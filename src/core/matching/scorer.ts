import type { Candidate, Query, ScoredHit, SourceKind } from './types';

export interface Alignment {
  matchLen: number;
  at: number;
}

/**
 * Failure function of the query: `pi[i]` is the length of the longest proper
 * prefix of `query[0..i]` that is also a suffix of it.
 */
export function prefixFunction(query: Query): number[] {
  const pi = new Array<number>(query.length).fill(0);
  let k = 0;
  for (let i = 1; i < query.length; i++) {
    while (k > 0 && query[i] !== query[k]) k = pi[k - 1] ?? 0;
    if (query[i] === query[k]) k++;
    pi[i] = k;
  }
  return pi;
}

/**
 * Longest run of `terms` equal to a prefix of `query`, and the earliest offset
 * in `terms` where a run of that length starts.
 */
export function bestAlignment(query: Query, terms: readonly bigint[]): Alignment {
  if (query.length === 0 || terms.length === 0) return { matchLen: 0, at: 0 };
  const pi = prefixFunction(query);
  let j = 0;
  let best = 0;
  let at = 0;
  for (let i = 0; i < terms.length; i++) {
    const term = terms[i];
    while (j > 0 && term !== query[j]) j = pi[j - 1] ?? 0;
    if (term === query[j]) j++;
    if (j > best) {
      best = j;
      at = i - j + 1;
    }
    if (j === query.length) break;
  }
  return { matchLen: best, at };
}

export function scoreOf(matchLen: number, queryLen: number): number {
  if (queryLen <= 0) return 0;
  return Math.min(1, Math.max(0, matchLen / queryLen));
}

export function scoreCandidate(query: Query, candidate: Candidate, source: SourceKind): ScoredHit {
  const { matchLen, at } = bestAlignment(query, candidate.terms);
  return {
    identifier: candidate.identifier,
    terms: candidate.terms,
    ...(candidate.name ? { name: candidate.name } : {}),
    ...(candidate.offset ? { offset: candidate.offset } : {}),
    score: scoreOf(matchLen, query.length),
    matchLen,
    at,
    source,
  };
}
