import test from 'node:test';
import assert from 'node:assert/strict';
import { sha256Hex } from '../src/core/crypto';
import { ParseError, ProviderError } from '../src/core/errors';
import { createQuery } from '../src/core/matching/query';
import { createOeisClient, type CachePolicy, type FetchLike, type OeisClientOptions } from '../src/core/sources/oeisClient';
import { createOnlineProvider } from '../src/core/sources/online';
import { MemoryResponseCache } from '../src/core/sources/responseCache';

type Reply = { status: number; body: string } | Error;

function scriptedFetch(...replies: Reply[]) {
  const calls: string[] = [];
  const agents: string[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push(url);
    agents.push(init.headers['User-Agent'] ?? '');
    const reply = replies[Math.min(calls.length - 1, replies.length - 1)];
    if (!reply) throw new Error('no scripted reply');
    if (reply instanceof Error) throw reply;
    return { ok: reply.status >= 200 && reply.status < 300, status: reply.status, text: async () => reply.body };
  };
  return { fetchImpl, calls, agents };
}

const FIB_BODY = JSON.stringify([{ number: 45, name: 'Fibonacci numbers', data: '0,1,1,2,3,5,8,13,21,34', offset: '0,4' }]);

function clientWith(fetchImpl: FetchLike, overrides: Partial<OeisClientOptions> = {}) {
  return createOeisClient({
    baseUrl: 'https://oeis.test/',
    timeoutMs: 1000,
    maxQueryTerms: 40,
    userAgent: 'seqprobe/test',
    cacheTtlDays: 30,
    cachePolicy: 'use',
    fetchImpl,
    ...overrides,
  });
}

const isProviderError = (kind: string) => (e: unknown) => e instanceof ProviderError && e.source === 'online' && e.kind === kind;

test('oeis client: search url keeps commas literal and caps the term count', () => {
  const { fetchImpl } = scriptedFetch();
  assert.equal(clientWith(fetchImpl).searchUrl(createQuery([1, 2, 3])), 'https://oeis.test/search?q=1,2,3&fmt=json');
  assert.equal(clientWith(fetchImpl).searchUrl(createQuery([-1, 2])), 'https://oeis.test/search?q=-1,2&fmt=json');
  assert.equal(clientWith(fetchImpl, { maxQueryTerms: 2 }).searchUrl(createQuery([1, 2, 3])), 'https://oeis.test/search?q=1,2&fmt=json');
});

test('oeis client: fetchById normalizes the A-number', async () => {
  const { fetchImpl, calls, agents } = scriptedFetch({ status: 200, body: FIB_BODY });
  const res = await clientWith(fetchImpl).fetchById(' a000045 ');
  assert.deepEqual(calls, ['https://oeis.test/search?q=id%3AA000045&fmt=json']);
  assert.deepEqual(agents, ['seqprobe/test']);
  assert.equal(res.fromCache, false);
  await assert.rejects(clientWith(fetchImpl).fetchById('B12'), ParseError);
});

test('oeis client: status codes and bodies map to provider error kinds', async () => {
  const q = createQuery([1, 2, 3]);
  await assert.rejects(clientWith(scriptedFetch({ status: 429, body: '' }).fetchImpl).search(q), isProviderError('rate_limited'));
  await assert.rejects(clientWith(scriptedFetch({ status: 500, body: '' }).fetchImpl).search(q), isProviderError('network'));
  await assert.rejects(clientWith(scriptedFetch(new Error('ECONNREFUSED')).fetchImpl).search(q), isProviderError('network'));
  await assert.rejects(clientWith(scriptedFetch({ status: 200, body: '<html>' }).fetchImpl).search(q), isProviderError('malformed'));
  await assert.rejects(
    clientWith(scriptedFetch({ status: 200, body: '{"results":"nope"}' }).fetchImpl).search(q),
    isProviderError('malformed')
  );
});

test('oeis client: timeouts are reported as network failures', async () => {
  const timeout = new Error('The operation was aborted due to timeout');
  timeout.name = 'TimeoutError';
  await assert.rejects(clientWith(scriptedFetch(timeout).fetchImpl).search(createQuery([1, 2, 3])), {
    name: 'ProviderError',
    message: 'request to https://oeis.test/search?q=1,2,3&fmt=json timed out after 1000ms',
  });
});

test('oeis client: a body that fails mid-read is a network failure', async () => {
  const timeout = new Error('The operation was aborted due to timeout');
  timeout.name = 'TimeoutError';
  const stalled: FetchLike = async () => ({
    ok: true,
    status: 200,
    text: async () => {
      throw timeout;
    },
  });
  await assert.rejects(clientWith(stalled).search(createQuery([1, 2, 3])), {
    name: 'ProviderError',
    message: 'request to https://oeis.test/search?q=1,2,3&fmt=json timed out after 1000ms',
  });

  const reset: FetchLike = async () => ({
    ok: true,
    status: 200,
    text: async () => {
      throw new Error('socket hang up');
    },
  });
  await assert.rejects(clientWith(reset).search(createQuery([1, 2, 3])), isProviderError('network'));
});

test('oeis client: cache policies', async () => {
  const q = createQuery([1, 2, 3]);
  const run = async (cachePolicy: CachePolicy) => {
    const cache = new MemoryResponseCache(10);
    const { fetchImpl, calls } = scriptedFetch({ status: 200, body: FIB_BODY });
    const client = clientWith(fetchImpl, { cache, cachePolicy });
    const first = await client.search(q);
    const second = await client.search(q);
    return { calls: calls.length, first: first.fromCache, second: second.fromCache, stored: cache.count() };
  };
  assert.deepEqual(await run('use'), { calls: 1, first: false, second: true, stored: 1 });
  assert.deepEqual(await run('refresh'), { calls: 2, first: false, second: false, stored: 1 });
  assert.deepEqual(await run('bypass'), { calls: 2, first: false, second: false, stored: 0 });
});

test('oeis client: expired entries are fetched again', async () => {
  let now = 1_000_000;
  const cache = new MemoryResponseCache(10, { now: () => now });
  const { fetchImpl, calls } = scriptedFetch({ status: 200, body: FIB_BODY });
  const client = clientWith(fetchImpl, { cache, cacheTtlDays: 1 });
  await client.search(createQuery([1, 2, 3]));
  now += 2 * 86_400;
  const res = await client.search(createQuery([1, 2, 3]));
  assert.equal(res.fromCache, false);
  assert.equal(calls.length, 2);
});

test('oeis client: an unreadable cache entry is replaced by a fresh response', async () => {
  const cache = new MemoryResponseCache(10);
  const { fetchImpl, calls } = scriptedFetch({ status: 200, body: FIB_BODY });
  const client = clientWith(fetchImpl, { cache });
  const url = client.searchUrl(createQuery([1, 2, 3]));
  cache.put(sha256Hex(`GET:${url}`), 'not json');
  const res = await client.search(createQuery([1, 2, 3]));
  assert.equal(res.fromCache, false);
  assert.equal(calls.length, 1);
  assert.equal(cache.get(sha256Hex(`GET:${url}`), 30), FIB_BODY);
});

test('online provider: turns the search payload into candidates', async () => {
  const { fetchImpl } = scriptedFetch({ status: 200, body: FIB_BODY });
  const provider = createOnlineProvider({ client: clientWith(fetchImpl) });
  const cands = await provider.lookup(createQuery([1, 2, 3, 5]));
  assert.equal(provider.source, 'online');
  assert.deepEqual(cands.map((c) => c.identifier), ['A000045']);
  assert.equal(cands[0]?.offset, '0,4');
  assert.equal(cands[0]?.terms.length, 10);
});
