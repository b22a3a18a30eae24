import { z } from 'zod';
import { parseTermList } from '../matching/query';
import type { Candidate } from '../matching/types';

export const MAX_DATA_TERMS = 400;
export const DEFAULT_MAX_CANDIDATES = 30;

const A_NUMBER = /^A\d{6}$/;

export const OeisEntrySchema = z
  .object({
    number: z.union([z.number().int().nonnegative(), z.string()]).optional(),
    id: z.string().optional(),
    name: z.string().optional(),
    data: z.string().optional(),
    offset: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

export type OeisEntry = z.infer<typeof OeisEntrySchema>;

/** The search endpoint has answered with both shapes over time. */
export const OeisSearchPayloadSchema = z.union([
  z.object({ results: z.array(OeisEntrySchema).nullish() }).passthrough(),
  z.array(OeisEntrySchema),
  z.null(),
]);

export type OeisSearchPayload = z.infer<typeof OeisSearchPayloadSchema>;

export function isCatalogId(value: string): boolean {
  return A_NUMBER.test(value);
}

export function formatCatalogId(n: number): string {
  return `A${String(n).padStart(6, '0')}`;
}

export function entryIdentifier(entry: OeisEntry): string | null {
  const num = entry.number;
  if (typeof num === 'number') return formatCatalogId(num);
  if (typeof num === 'string' && /^\d+$/.test(num.trim())) return formatCatalogId(Number(num.trim()));
  const id = String(entry.id ?? '').trim().toUpperCase();
  // Older payloads carry "A000045 M0692 N0256" in id.
  const first = id.split(/\s+/)[0] ?? '';
  return isCatalogId(first) ? first : null;
}

export function payloadEntries(payload: OeisSearchPayload): OeisEntry[] {
  if (payload === null) return [];
  if (Array.isArray(payload)) return payload;
  return payload.results ?? [];
}

export function entryToCandidate(entry: OeisEntry): Candidate | null {
  const identifier = entryIdentifier(entry);
  if (!identifier) return null;
  const name = String(entry.name ?? '').trim();
  const offset = entry.offset === undefined ? '' : String(entry.offset).trim();
  return {
    identifier,
    terms: parseTermList(entry.data ?? '', MAX_DATA_TERMS),
    ...(name ? { name } : {}),
    ...(offset ? { offset } : {}),
  };
}

export function candidatesFromPayload(payload: OeisSearchPayload, maxCandidates = DEFAULT_MAX_CANDIDATES): Candidate[] {
  const out: Candidate[] = [];
  for (const entry of payloadEntries(payload).slice(0, maxCandidates)) {
    const c = entryToCandidate(entry);
    if (c) out.push(c);
  }
  return out;
}
