import { parseTermList } from '../matching/query';
import type { Candidate, CandidateProvider, Query } from '../matching/types';
import type { OfflineIndex } from './offlineIndex';
import { DEFAULT_MAX_CANDIDATES, MAX_DATA_TERMS } from './payload';

export interface OfflineProviderOptions {
  maxCandidates?: number;
}

export function queryNeedle(query: Query): string {
  return `,${query.map((t) => t.toString()).join(',')},`;
}

/**
 * Candidates are the dump lines that contain the whole query as a run of
 * consecutive terms.
 */
export function createOfflineProvider(index: OfflineIndex, options: OfflineProviderOptions = {}): CandidateProvider {
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  return {
    source: 'offline',
    async lookup(query) {
      const needle = queryNeedle(query);
      const out: Candidate[] = [];
      for (const entry of index.entries) {
        if (!entry.line.includes(needle)) continue;
        const name = index.names.get(entry.identifier);
        out.push({
          identifier: entry.identifier,
          terms: parseTermList(entry.line, MAX_DATA_TERMS),
          ...(name ? { name } : {}),
        });
        if (out.length >= maxCandidates) break;
      }
      return out;
    },
  };
}
