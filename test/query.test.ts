import test from 'node:test';
import assert from 'node:assert/strict';
import { ParseError } from '../src/core/errors';
import { createQuery, formatQuery, parseQuery, parseTermList, shortenQuery } from '../src/core/matching/query';

test('query: commas, spaces and mixed separators parse the same', () => {
  assert.deepEqual(parseQuery('1,2,3,4'), [1n, 2n, 3n, 4n]);
  assert.deepEqual(parseQuery('1 2 3 4'), [1n, 2n, 3n, 4n]);
  assert.deepEqual(parseQuery('1, 2,3  4'), [1n, 2n, 3n, 4n]);
  assert.deepEqual(parseQuery('  7\n8\t9 '), [7n, 8n, 9n]);
});

test('query: signs and arbitrarily large terms are kept exactly', () => {
  assert.deepEqual(parseQuery('-1,+2, -30'), [-1n, 2n, -30n]);
  assert.deepEqual(parseQuery('123456789012345678901234567890'), [123456789012345678901234567890n]);
});

test('query: non-integer tokens are rejected with the offending token', () => {
  assert.throws(() => parseQuery('1,2,x'), (e: unknown) => e instanceof ParseError && e.token === 'x');
  assert.throws(() => parseQuery('1.5,2'), (e: unknown) => e instanceof ParseError && e.token === '1.5');
  assert.throws(() => parseQuery('1e3'), ParseError);
});

test('query: empty input is a parse error', () => {
  assert.throws(() => parseQuery(''), { name: 'ParseError', message: 'empty terms string' });
  assert.throws(() => parseQuery(' , ,'), { name: 'ParseError', message: 'empty terms string' });
});

test('query: parsed queries are frozen and shortening copies', () => {
  const q = parseQuery('1,2,3,4,5');
  assert.ok(Object.isFrozen(q));
  const short = shortenQuery(q, 2);
  assert.deepEqual(short, [1n, 2n, 3n]);
  assert.equal(q.length, 5);
  assert.deepEqual(shortenQuery(q, 9), []);
});

test('query: createQuery accepts safe integers and bigints only', () => {
  assert.deepEqual(createQuery([1, 2n, -3]), [1n, 2n, -3n]);
  assert.throws(() => createQuery([1.5]), ParseError);
  assert.throws(() => createQuery([]), ParseError);
});

test('query: formatQuery joins with commas and truncates', () => {
  const q = createQuery([5, 8, 13, 21]);
  assert.equal(formatQuery(q), '5,8,13,21');
  assert.equal(formatQuery(q, 2), '5,8');
});

test('query: catalog term lists stop at the first bad token', () => {
  assert.deepEqual(parseTermList('1, 2,,3,x,4'), [1n, 2n, 3n]);
  assert.deepEqual(parseTermList(',0,1,1,2,'), [0n, 1n, 1n, 2n]);
  assert.deepEqual(parseTermList('1,2,3,4,5', 3), [1n, 2n, 3n]);
  assert.deepEqual(parseTermList(''), []);
});
