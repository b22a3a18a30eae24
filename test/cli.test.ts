import test from 'node:test';
import assert from 'node:assert/strict';
import { routeArgv } from '../bin/seqprobe';
import { ProbeSchema } from '../src/cli/schemas/probeSchemas';
import { CachePruneSchema } from '../src/cli/schemas/cacheSchemas';
import { errorFromException } from '../src/cli/types';
import { ConfigError, OfflineIndexError } from '../src/core/errors';

const argv = (...args: string[]) => ['node', 'seqprobe', ...args];

test('cli: bare terms route to probe', () => {
  assert.deepEqual(routeArgv(argv('1,2,3')), argv('probe', '1,2,3'));
  assert.deepEqual(routeArgv(argv('--relax', '1 2 3')), argv('probe', '--relax', '1 2 3'));
  assert.deepEqual(routeArgv(argv()), argv('probe'));
});

test('cli: known commands and global flags pass through', () => {
  assert.deepEqual(routeArgv(argv('fetch', 'A000045')), argv('fetch', 'A000045'));
  assert.deepEqual(routeArgv(argv('cache', 'stats')), argv('cache', 'stats'));
  assert.deepEqual(routeArgv(argv('--help')), argv('--help'));
  assert.deepEqual(routeArgv(argv('-V')), argv('-V'));
});

test('cli: probe defaults', () => {
  const input = ProbeSchema.parse({ terms: '1,2,3' });
  assert.equal(input.maxHits, 10);
  assert.equal(input.rank, 'strict');
  assert.equal(input.minMatchLen, 0);
  assert.equal(input.relax, false);
  assert.equal(input.relaxMinTerms, 3);
  assert.equal(input.online, true);
  assert.equal(input.cache, 'use');
  assert.equal(input.json, false);
});

test('cli: commander option strings are coerced', () => {
  const input = ProbeSchema.parse({ terms: '1,2,3', maxHits: '5', minMatchLen: '4', rank: 'prefer-early' });
  assert.equal(input.maxHits, 5);
  assert.equal(input.minMatchLen, 4);
  assert.equal(input.rank, 'prefer-early');
  assert.equal(ProbeSchema.safeParse({ rank: 'loose' }).success, false);
  assert.equal(CachePruneSchema.parse({ ttlDays: '7' }).ttlDays, 7);
});

test('cli: deliberate errors keep their code and gain a hint', () => {
  const cfg = errorFromException(new ConfigError('maxHits', 'maxHits must be a positive integer, got 0', 0));
  assert.equal(cfg.reason, 'config_error');
  assert.equal(cfg.message, 'maxHits must be a positive integer, got 0');
  assert.deepEqual(cfg.details, { option: 'maxHits', value: 0 });
  assert.equal(typeof cfg.hint, 'string');
  assert.equal(errorFromException(new OfflineIndexError('/tmp/x', 'stripped file not found: /tmp/x')).reason, 'offline_index_failed');
  assert.throws(() => errorFromException(new Error('boom')), /boom/);
});
