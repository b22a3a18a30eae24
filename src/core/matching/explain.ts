import type { Explanation, Query } from './types';

/**
 * First position where the query departs from the hit's terms, compared
 * index by index from the start of both. Null when the query is a literal
 * prefix of the terms.
 */
export function explainMismatch(query: Query, terms: readonly bigint[]): Explanation | null {
  for (let i = 0; i < query.length; i++) {
    const queryValue = query[i];
    if (queryValue === undefined) break;
    const expectedValue = terms[i];
    if (expectedValue === undefined) {
      return { reason: 'sequence_ended', mismatchIndex: i, queryValue, expectedValue: null };
    }
    if (queryValue !== expectedValue) {
      return { reason: 'value_mismatch', mismatchIndex: i, queryValue, expectedValue };
    }
  }
  return null;
}
