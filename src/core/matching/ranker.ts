import type { RankPolicy, RankedResult, ScoredHit } from './types';

export const DEFAULT_MAX_HITS = 10;

function compareIdentifiers(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareStrength(a: ScoredHit, b: ScoredHit): number {
  return b.score - a.score || b.matchLen - a.matchLen;
}

const comparators: Record<RankPolicy, (a: ScoredHit, b: ScoredHit) => number> = {
  strict: (a, b) => compareStrength(a, b) || compareIdentifiers(a.identifier, b.identifier),
  'prefer-early': (a, b) => compareStrength(a, b) || a.at - b.at || compareIdentifiers(a.identifier, b.identifier),
};

export function compareHits(policy: RankPolicy): (a: ScoredHit, b: ScoredHit) => number {
  return comparators[policy];
}

export function rankHits(hits: readonly ScoredHit[], policy: RankPolicy = 'strict', maxHits = DEFAULT_MAX_HITS): RankedResult {
  const sorted = hits.slice().sort(compareHits(policy));
  return sorted.slice(0, Math.max(0, maxHits));
}
