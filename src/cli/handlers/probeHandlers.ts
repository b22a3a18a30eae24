import fs from 'fs-extra';
import { createLogger, serializeError } from '../../core/log';
import { probe } from '../../core/matching/engine';
import { parseQuery } from '../../core/matching/query';
import type { ProbeOutcome, Query, SourceKind } from '../../core/matching/types';
import type { FetchLike } from '../../core/sources/oeisClient';
import { buildProviders, readTermsInput, resolveRuntimeConfig, type BuiltProviders } from '../helpers';
import { buildProbeReport, renderProbeText } from '../render';
import type { ProbeInput } from '../schemas/probeSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, errorFromException, ErrorReasons, ErrorHints } from '../types';

export interface ProbeDeps {
  fetchImpl?: FetchLike;
}

export async function handleProbe(input: ProbeInput, deps: ProbeDeps = {}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'probe' });
  const startedAt = Date.now();

  let text: string | null;
  try {
    text = await readTermsInput(input);
  } catch (e) {
    log.warn('terms_file_unreadable', { path: input.termsFile, err: serializeError(e) });
    return error(ErrorReasons.MISSING_TERMS, {
      message: `probe: couldn't read terms file ${input.termsFile ?? ''}: ${e instanceof Error ? e.message : String(e)}`,
      hint: ErrorHints.MISSING_TERMS,
    });
  }
  if (text === null) {
    return error(ErrorReasons.MISSING_TERMS, { message: 'probe: no terms given', hint: ErrorHints.MISSING_TERMS });
  }

  let query: Query;
  let built: BuiltProviders;
  try {
    query = parseQuery(text);
    const config = resolveRuntimeConfig({
      baseUrl: input.baseUrl,
      timeoutMs: input.timeoutMs,
      maxQueryTerms: input.maxQueryTerms,
      cacheDb: input.cacheDb,
      cacheTtlDays: input.cacheTtlDays,
    });
    built = await buildProviders(config, {
      online: input.online,
      maxCandidates: input.maxHits > 0 ? input.maxHits * 3 : 1,
      cachePolicy: input.cache,
      ...(input.offlineStripped ? { offlineStripped: input.offlineStripped } : {}),
      ...(input.offlineNames ? { offlineNames: input.offlineNames } : {}),
      ...(input.offlineMaxScan !== undefined ? { offlineMaxScan: input.offlineMaxScan } : {}),
      ...(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {}),
    });
  } catch (e) {
    log.error('probe', { ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
    return errorFromException(e);
  }

  const sources: SourceKind[] = [];
  if (built.providers.online) sources.push('online');
  if (built.providers.offline) sources.push('offline');

  let outcome: ProbeOutcome;
  try {
    outcome = await probe(query, built.providers, {
      maxHits: input.maxHits,
      rank: input.rank,
      minMatchLen: input.minMatchLen,
      relax: input.relax,
      relaxMinTerms: input.relaxMinTerms,
      ...(input.relaxMaxSteps !== undefined ? { relaxMaxSteps: input.relaxMaxSteps } : {}),
      explain: input.explainTop,
      sources,
      strictProviders: input.strictProviders,
    });
  } catch (e) {
    log.error('probe', {
      ok: false,
      duration_ms: Date.now() - startedAt,
      err: serializeError(e),
    });
    return errorFromException(e);
  } finally {
    built.cache?.close();
  }

  const report = buildProbeReport(outcome, {
    sources,
    rank: input.rank,
    minMatchLen: input.minMatchLen,
    relax: input.relax,
    relaxMinTerms: input.relaxMinTerms,
    explainTop: input.explainTop,
  });

  if (input.jsonOut) {
    await fs.outputJSON(input.jsonOut, report, { spaces: 2 });
  }

  log.info('probe', {
    ok: true,
    query_len: query.length,
    sources,
    rank: input.rank,
    hits: outcome.hits.length,
    dropped: outcome.dropped,
    relax_attempts: outcome.relaxation.attempts,
    source_errors: outcome.sourceErrors.length,
    offline_entries: built.offlineEntries,
    duration_ms: Date.now() - startedAt,
  });

  return success({
    ...report,
    ...(input.json ? {} : { textOutput: renderProbeText(outcome, { explainTop: input.explainTop }) }),
  });
}
