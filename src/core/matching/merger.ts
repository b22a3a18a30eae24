import type { ScoredHit } from './types';

function compareTerms(a: readonly bigint[], b: readonly bigint[]): number {
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0n;
    const y = b[i] ?? 0n;
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}

/**
 * Total order over duplicates of one identifier. Past the match fields, more
 * terms win, then the larger terms, name and offset.
 */
function preferIncoming(current: ScoredHit, incoming: ScoredHit): boolean {
  if (incoming.score !== current.score) return incoming.score > current.score;
  if (incoming.source !== current.source) return incoming.source === 'online';
  if (incoming.matchLen !== current.matchLen) return incoming.matchLen > current.matchLen;
  if (incoming.at !== current.at) return incoming.at < current.at;
  const byTerms = compareTerms(incoming.terms, current.terms);
  if (byTerms !== 0) return byTerms > 0;
  const [inName, curName] = [incoming.name ?? '', current.name ?? ''];
  if (inName !== curName) return inName > curName;
  return (incoming.offset ?? '') > (current.offset ?? '');
}

/**
 * Deduplicate hits from every source by identifier, keeping the strongest.
 * The result is unordered; ranking happens afterwards.
 */
export function mergeHits(...streams: ReadonlyArray<readonly ScoredHit[]>): ScoredHit[] {
  const byId = new Map<string, ScoredHit>();
  for (const stream of streams) {
    for (const hit of stream) {
      const prev = byId.get(hit.identifier);
      if (!prev || preferIncoming(prev, hit)) byId.set(hit.identifier, hit);
    }
  }
  return Array.from(byId.values());
}

export function filterByMatchLen(hits: readonly ScoredHit[], minMatchLen: number): ScoredHit[] {
  if (minMatchLen <= 0) return hits.slice();
  return hits.filter((h) => h.matchLen >= minMatchLen);
}
