import test from 'node:test';
import assert from 'node:assert/strict';

import { normalizeRankColumns, normalizeRanks, parseRank } from '../src/pipeline/rank_normalizer.js';

function assertClose(actual: number | null | undefined, expected: number) {
  assert.equal(typeof actual, 'number');
  assert.ok(Math.abs(Number(actual) - expected) < 1e-9, `expected ${expected}, received ${actual}`);
}

test('parses tied, banded and plain rank cells', () => {
  assert.equal(parseRank('=5'), 5);
  assert.equal(parseRank('101-150'), 125.5);
  assert.equal(parseRank(' 4 '), 4);
  assert.equal(parseRank('1201+'), 1201);
  assert.equal(parseRank(12), 12);
});

test('returns null for cells that are not ranks', () => {
  assert.equal(parseRank(''), null);
  assert.equal(parseRank('n/a'), null);
  assert.equal(parseRank('10-top'), null);
  assert.equal(parseRank(null), null);
  assert.equal(parseRank(Number.NaN), null);
});

test('maps rank 1 to 100 and the worst rank to 0', () => {
  const result = normalizeRanks([
    ['a', 1],
    ['b', 51],
    ['c', 101],
    ['d', null],
  ]);
  assert.equal(result.get('a'), 100);
  assert.equal(result.get('b'), 50);
  assert.equal(result.get('c'), 0);
  assert.equal(result.get('d'), null);
});

test('keeps the worst rank at 0 when the best observed rank is above 1', () => {
  const result = normalizeRanks([
    ['a', 5],
    ['b', 9],
  ]);
  assertClose(result.get('a'), 50);
  assert.equal(result.get('b'), 0);
});

test('returns null for every entry when the column has no spread', () => {
  const single = normalizeRanks([
    ['a', 7],
    ['b', 7],
    ['c', null],
  ]);
  assert.deepEqual([...single.values()], [null, null, null]);

  const empty = normalizeRanks<string>([['a', null]]);
  assert.equal(empty.get('a'), null);

  const onlyFirst = normalizeRanks([['a', 1]]);
  assert.equal(onlyFirst.get('a'), null);
});

test('normalizes each rank column independently', () => {
  const normalized = normalizeRankColumns([
    { qsGlobalRank: 1, theRank: 3, qsSubjectRank: null },
    { qsGlobalRank: 11, theRank: null, qsSubjectRank: 4 },
    { qsGlobalRank: 21, theRank: 1, qsSubjectRank: 4 },
  ]);
  assert.deepEqual(normalized[0], { qsGlobalNorm: 100, theNorm: 0, qsSubjectNorm: null });
  assertClose(normalized[1]?.qsGlobalNorm, 50);
  assert.equal(normalized[1]?.theNorm, null);
  assert.equal(normalized[1]?.qsSubjectNorm, null);
  assert.equal(normalized[2]?.qsGlobalNorm, 0);
  assert.equal(normalized[2]?.theNorm, 100);
});
