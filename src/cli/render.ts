import { formatQuery } from '../core/matching/query';
import type { Explanation, ProbeOutcome, Query, ScoredHit } from '../core/matching/types';

const NAME_WIDTH = 56;

/** Terms beyond 2^53 are emitted as decimal strings. */
export function termToJson(term: bigint): number | string {
  const n = Number(term);
  return Number.isSafeInteger(n) ? n : term.toString();
}

export function hitToJson(hit: ScoredHit, dataPrefix = 30) {
  return {
    id: hit.identifier,
    name: hit.name ?? '',
    offset: hit.offset ?? '',
    source: hit.source,
    score: hit.score,
    match_len: hit.matchLen,
    at: hit.at,
    data_prefix: hit.terms.slice(0, dataPrefix).map(termToJson),
  };
}

export function explanationToJson(explanation: Explanation | null) {
  if (!explanation) return null;
  return {
    reason: explanation.reason,
    mismatch_index: explanation.mismatchIndex,
    query_value: termToJson(explanation.queryValue),
    expected_value: explanation.expectedValue === null ? null : termToJson(explanation.expectedValue),
  };
}

export interface ProbeReportSettings {
  sources: string[];
  rank: string;
  minMatchLen: number;
  relax: boolean;
  relaxMinTerms: number;
  explainTop: boolean;
}

export function buildProbeReport(outcome: ProbeOutcome, settings: ProbeReportSettings) {
  return {
    query_terms: outcome.query.map(termToJson),
    effective_query_len: outcome.effectiveQuery.length,
    dropped_terms: outcome.dropped,
    online_enabled: settings.sources.includes('online'),
    offline_enabled: settings.sources.includes('offline'),
    rank: settings.rank,
    min_match_len: settings.minMatchLen,
    relax: settings.relax,
    relax_min_terms: settings.relaxMinTerms,
    relax_attempts: outcome.relaxation.attempts,
    relax_exhausted: outcome.relaxation.exhausted,
    explain_top: settings.explainTop,
    count: outcome.hits.length,
    hits: outcome.hits.map((h) => hitToJson(h)),
    explanation: settings.explainTop ? explanationToJson(outcome.explanation) : undefined,
    source_errors: outcome.sourceErrors,
  };
}

function truncateName(name: string): string {
  return name.length > NAME_WIDTH ? `${name.slice(0, NAME_WIDTH - 3)}...` : name;
}

export function renderHitsTable(query: Query, hits: readonly ScoredHit[], showTerms = 12): string {
  const lines: string[] = [];
  const more = query.length > showTerms ? '…' : '';
  lines.push(`Query terms (${query.length}): ${formatQuery(query, showTerms)}${more}`);
  if (hits.length === 0) {
    lines.push('No hits.');
    return lines.join('\n');
  }
  lines.push('');
  lines.push(`${'A-number'.padEnd(8)}  ${'score'.padStart(5)}  ${'match'.padStart(7)}  ${'at'.padStart(4)}  ${'source'.padEnd(7)}  name`);
  lines.push('-'.repeat(78));
  for (const h of hits) {
    lines.push(
      `${h.identifier.padEnd(8)}  ${h.score.toFixed(2).padStart(5)}  ${String(h.matchLen).padStart(7)}  ${String(h.at).padStart(4)}  ${h.source.padEnd(7)}  ${truncateName(h.name ?? '')}`
    );
  }
  return lines.join('\n');
}

export function renderExplanation(top: ScoredHit, query: Query, explanation: Explanation | null): string {
  if (!explanation) {
    return `[explain] top ${top.identifier}: full match (${query.length}/${query.length})`;
  }
  const i = explanation.mismatchIndex;
  const got = explanation.queryValue.toString();
  if (explanation.reason === 'sequence_ended') {
    return `[explain] top ${top.identifier}: query[${i}] (#${i + 1}) = ${got} runs past the ${top.terms.length} known terms`;
  }
  return `[explain] top ${top.identifier}: first mismatch at query[${i}] (#${i + 1}) -> got ${got}; expected ${explanation.expectedValue.toString()}`;
}

export function renderProbeText(outcome: ProbeOutcome, options: { explainTop: boolean }): string {
  const lines = [renderHitsTable(outcome.query, outcome.hits)];
  if (outcome.dropped > 0) {
    lines.push(`[relax] matched after dropping ${outcome.dropped} trailing term(s); query length ${outcome.effectiveQuery.length}`);
  } else if (outcome.relaxation.exhausted) {
    lines.push(`[relax] no hits after ${outcome.relaxation.attempts} shortened queries`);
  }
  const top = outcome.hits[0];
  if (options.explainTop && top) {
    lines.push(renderExplanation(top, outcome.query, outcome.explanation));
  }
  for (const failure of outcome.sourceErrors) {
    lines.push(`[warn] ${failure.source} lookup failed (${failure.kind}): ${failure.message}`);
  }
  return lines.join('\n');
}
