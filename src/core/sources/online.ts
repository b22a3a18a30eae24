import { createLogger } from '../log';
import type { CandidateProvider } from '../matching/types';
import type { OeisClient } from './oeisClient';
import { candidatesFromPayload, DEFAULT_MAX_CANDIDATES } from './payload';

export interface OnlineProviderOptions {
  client: OeisClient;
  maxCandidates?: number;
}

const log = createLogger({ component: 'sources', kind: 'online' });

export function createOnlineProvider(options: OnlineProviderOptions): CandidateProvider {
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  return {
    source: 'online',
    async lookup(query) {
      const res = await options.client.search(query);
      const candidates = candidatesFromPayload(res.payload, maxCandidates);
      log.debug('lookup', { url: res.url, from_cache: res.fromCache, candidates: candidates.length });
      return candidates;
    },
  };
}
