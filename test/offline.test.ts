import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import zlib from 'zlib';
import fs from 'fs-extra';
import { OfflineIndexError } from '../src/core/errors';
import { createQuery } from '../src/core/matching/query';
import { createOfflineProvider, queryNeedle } from '../src/core/sources/offline';
import { loadOfflineIndex, normalizeTermLine, parseNamesLine, parseStrippedLine } from '../src/core/sources/offlineIndex';

const STRIPPED = [
  '# test dump',
  'A000045 ,0,1,1,2,3,5,8,13,21,34,55,89,144,',
  'A000027 ,1,2,3,4,5,6,7,8,9,10,',
  'A000290 ,0,1,4,9,16,25,36,49,',
  'bogus line',
  'B000001 ,1,2,',
].join('\n') + '\n';

const NAMES = ['# names', 'A000045 Fibonacci numbers', 'A000027 The positive integers.'].join('\n') + '\n';

async function fixtureDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'seqprobe-offline-'));
  await fs.writeFile(path.join(dir, 'stripped'), STRIPPED);
  await fs.writeFile(path.join(dir, 'stripped.gz'), zlib.gzipSync(STRIPPED));
  await fs.writeFile(path.join(dir, 'names'), NAMES);
  return dir;
}

test('offline index: line parsers', () => {
  assert.deepEqual(parseStrippedLine('A000045 ,0, 1 ,1,'), { identifier: 'A000045', line: ',0,1,1,' });
  assert.equal(parseStrippedLine('# comment'), null);
  assert.equal(parseStrippedLine('X1 ,1,'), null);
  assert.deepEqual(parseNamesLine('A000027 The positive integers.'), ['A000027', 'The positive integers.']);
  assert.equal(parseNamesLine('A000027'), null);
  assert.equal(normalizeTermLine('1,2'), ',1,2,');
});

test('offline index: loads entries and names, skipping junk lines', async () => {
  const dir = await fixtureDir();
  const index = await loadOfflineIndex({ strippedPath: path.join(dir, 'stripped'), namesPath: path.join(dir, 'names') });
  assert.deepEqual(index.entries.map((e) => e.identifier), ['A000045', 'A000027', 'A000290']);
  assert.equal(index.scanned, 6);
  assert.equal(index.names.get('A000045'), 'Fibonacci numbers');
  assert.equal(index.names.size, 2);
});

test('offline index: gzip dumps read the same', async () => {
  const dir = await fixtureDir();
  const index = await loadOfflineIndex({ strippedPath: path.join(dir, 'stripped.gz') });
  assert.deepEqual(index.entries.map((e) => e.identifier), ['A000045', 'A000027', 'A000290']);
});

test('offline index: maxScan stops reading early', async () => {
  const dir = await fixtureDir();
  const index = await loadOfflineIndex({ strippedPath: path.join(dir, 'stripped'), maxScan: 2 });
  assert.equal(index.scanned, 2);
  assert.deepEqual(index.entries.map((e) => e.identifier), ['A000045']);
});

test('offline index: a missing dump fails, a missing names file does not', async () => {
  const dir = await fixtureDir();
  await assert.rejects(loadOfflineIndex({ strippedPath: path.join(dir, 'nope') }), OfflineIndexError);
  const index = await loadOfflineIndex({ strippedPath: path.join(dir, 'stripped'), namesPath: path.join(dir, 'nope') });
  assert.equal(index.names.size, 0);
  assert.equal(index.entries.length, 3);
});

test('offline provider: returns lines containing the query as a run', async () => {
  const dir = await fixtureDir();
  const index = await loadOfflineIndex({ strippedPath: path.join(dir, 'stripped'), namesPath: path.join(dir, 'names') });
  const provider = createOfflineProvider(index);

  const hits = await provider.lookup(createQuery([1, 2, 3]));
  assert.deepEqual(hits.map((c) => c.identifier), ['A000045', 'A000027']);
  assert.equal(hits[1]?.name, 'The positive integers.');

  const squares = await provider.lookup(createQuery([4, 9, 16]));
  assert.deepEqual(squares.map((c) => c.identifier), ['A000290']);
  assert.equal(squares[0]?.name, undefined);
  assert.equal(squares[0]?.terms.length, 8);

  // ",8," must not match the start of ",89,"
  assert.deepEqual((await provider.lookup(createQuery([34, 55, 8]))).length, 0);
  assert.equal((await createOfflineProvider(index, { maxCandidates: 1 }).lookup(createQuery([1, 2, 3]))).length, 1);
});

test('offline provider: needle is comma delimited on both ends', () => {
  assert.equal(queryNeedle(createQuery([-1, 2])), ',-1,2,');
});
