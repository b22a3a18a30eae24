export * from './types';
export { parseQuery, createQuery, shortenQuery, formatQuery, parseTermList } from './query';
export { bestAlignment, prefixFunction, scoreCandidate, scoreOf } from './scorer';
export type { Alignment } from './scorer';
export { rankHits, compareHits, DEFAULT_MAX_HITS } from './ranker';
export { mergeHits, filterByMatchLen } from './merger';
export { relaxQuery, relaxStepLimit, DEFAULT_RELAX_MIN_TERMS } from './relax';
export type { RelaxOptions, RelaxResult, PassRunner } from './relax';
export { explainMismatch } from './explain';
export { probe, validateProbeOptions } from './engine';
export type { ResolvedProbeOptions } from './engine';
