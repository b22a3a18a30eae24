import { shortenQuery } from './query';
import type { Query, ScoredHit } from './types';

export const DEFAULT_RELAX_MIN_TERMS = 3;

export interface RelaxOptions {
  minTerms: number;
  maxSteps?: number;
}

export interface RelaxResult {
  hits: ScoredHit[];
  query: Query;
  dropped: number;
  attempts: number;
  exhausted: boolean;
}

/** Runs one provider -> scorer -> merge -> filter pass for a (possibly shortened) query. */
export type PassRunner = (query: Query, dropped: number) => Promise<ScoredHit[]>;

export function relaxStepLimit(queryLen: number, options: RelaxOptions): number {
  const byLength = Math.max(0, queryLen - options.minTerms);
  if (options.maxSteps === undefined) return byLength;
  return Math.min(byLength, Math.max(0, options.maxSteps));
}

/**
 * Drop trailing terms one at a time until a pass yields hits. Attempts run
 * strictly in sequence and stop at the first non-empty result.
 */
export async function relaxQuery(query: Query, runPass: PassRunner, options: RelaxOptions): Promise<RelaxResult> {
  const limit = relaxStepLimit(query.length, options);
  let attempts = 0;
  for (let dropped = 1; dropped <= limit; dropped++) {
    const shortened = shortenQuery(query, dropped);
    attempts++;
    const hits = await runPass(shortened, dropped);
    if (hits.length > 0) {
      return { hits, query: shortened, dropped, attempts, exhausted: false };
    }
  }
  return { hits: [], query, dropped: 0, attempts, exhausted: true };
}
