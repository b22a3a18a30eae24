import { ParseError } from '../errors';
import type { Query } from './types';

const INTEGER_TOKEN = /^[+-]?\d+$/;

function parseToken(token: string): bigint {
  if (!INTEGER_TOKEN.test(token)) {
    throw new ParseError(`bad term '${token}' (expected a base-10 integer)`, token);
  }
  const unsigned = token.startsWith('+') ? token.slice(1) : token;
  return BigInt(unsigned);
}

/**
 * Parse "1,2,3", "1 2 3" or "1, 2,3  4" into a query.
 */
export function parseQuery(text: string): Query {
  const tokens = String(text ?? '')
    .replace(/,/g, ' ')
    .split(/\s+/)
    .filter(Boolean);
  if (tokens.length === 0) throw new ParseError('empty terms string');
  return Object.freeze(tokens.map(parseToken));
}

export function createQuery(terms: ReadonlyArray<number | bigint>): Query {
  if (terms.length === 0) throw new ParseError('empty terms list');
  const out = terms.map((t) => {
    if (typeof t === 'bigint') return t;
    if (!Number.isSafeInteger(t)) throw new ParseError(`bad term '${String(t)}' (expected an integer)`, String(t));
    return BigInt(t);
  });
  return Object.freeze(out);
}

export function shortenQuery(query: Query, drop: number): Query {
  const keep = Math.max(0, query.length - Math.max(0, drop));
  return Object.freeze(query.slice(0, keep));
}

export function formatQuery(query: Query, maxTerms?: number): string {
  const terms = maxTerms === undefined ? query : query.slice(0, maxTerms);
  return terms.map((t) => t.toString()).join(',');
}

/**
 * Parse a comma-separated catalog term list, stopping at the first token that
 * is not an integer.
 */
export function parseTermList(data: string, maxTerms = 400): bigint[] {
  const out: bigint[] = [];
  for (const raw of String(data ?? '').split(',')) {
    const token = raw.trim();
    if (!token) continue;
    if (!INTEGER_TOKEN.test(token)) break;
    out.push(BigInt(token.startsWith('+') ? token.slice(1) : token));
    if (out.length >= maxTerms) break;
  }
  return out;
}
