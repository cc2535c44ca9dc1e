import test from 'node:test';
import assert from 'node:assert/strict';

import {
  ALEVEL_GRADE_OPTIONS,
  IB_POINTS_OPTIONS,
  gradeScoreToDisplay,
  parseAlevelGrades,
  parseIbPoints,
} from '../src/pipeline/grade_parser.js';

test('scores A-Level grade strings by summing grade values', () => {
  assert.equal(parseAlevelGrades('A*A*A*'), 18);
  assert.equal(parseAlevelGrades('A*AA'), 16);
  assert.equal(parseAlevelGrades('AAB'), 14);
  assert.equal(parseAlevelGrades('BBC'), 11);
  assert.equal(parseAlevelGrades('  ccc '), null);
  assert.equal(parseAlevelGrades('CCD'), 8);
});

test('scores the typical offers', () => {
  assert.equal(parseAlevelGrades('A*A*A'), 17);
  assert.equal(parseAlevelGrades('AAA'), 15);
});

test('sums token values for every grade string up to four grades', () => {
  const tokens: Array<[string, number]> = [
    ['A*', 6],
    ['A', 5],
    ['B', 4],
    ['C', 3],
    ['D', 2],
    ['E', 1],
  ];
  let combos: Array<[string, number]> = [['', 0]];
  for (let length = 1; length <= 4; length += 1) {
    combos = combos.flatMap(([text, total]) =>
      tokens.map(([grade, value]): [string, number] => [text + grade, total + value]),
    );
    for (const [text, total] of combos) {
      assert.equal(parseAlevelGrades(text), total, text);
    }
  }
});

test('uses the higher end of a grade range', () => {
  assert.equal(parseAlevelGrades('ABB-BBB'), 13);
  assert.equal(parseAlevelGrades('A*AA-AAA'), 16);
  assert.equal(parseAlevelGrades('AAB - ABB'), 14);
});

test('ignores surrounding text but keeps grades inside it', () => {
  assert.equal(parseAlevelGrades('AAA including Maths'), 15);
  assert.equal(parseAlevelGrades('Grades: AAB'), 14);
});

test('treats blank or unavailable requirements as absent', () => {
  assert.equal(parseAlevelGrades(null), null);
  assert.equal(parseAlevelGrades(undefined), null);
  assert.equal(parseAlevelGrades(''), null);
  assert.equal(parseAlevelGrades('nan'), null);
  assert.equal(parseAlevelGrades('Not accepted'), null);
  assert.equal(parseAlevelGrades('see website'), null);
  assert.equal(parseAlevelGrades('n/a'), null);
});

test('parses the first number of an IB requirement', () => {
  assert.equal(parseIbPoints('38'), 38);
  assert.equal(parseIbPoints('38-40 points'), 38);
  assert.equal(parseIbPoints('36 Points'), 36);
  assert.equal(parseIbPoints('36 Points (666)'), 36);
  assert.equal(parseIbPoints('Minimum 42 overall'), 42);
});

test('rejects IB points outside the diploma range', () => {
  assert.equal(parseIbPoints('15 points'), null);
  assert.equal(parseIbPoints('19'), null);
  assert.equal(parseIbPoints('20'), 20);
  assert.equal(parseIbPoints('45'), 45);
  assert.equal(parseIbPoints('766'), null);
  assert.equal(parseIbPoints('Not accepted'), null);
  assert.equal(parseIbPoints('points on request'), null);
  assert.equal(parseIbPoints(null), null);
});

test('exposes picker options in descending order', () => {
  assert.equal(IB_POINTS_OPTIONS[0], 45);
  assert.equal(IB_POINTS_OPTIONS.at(-1), 24);
  assert.equal(IB_POINTS_OPTIONS.length, 22);
  assert.deepEqual(
    ALEVEL_GRADE_OPTIONS.map((option) => option.score),
    [18, 17, 16, 15, 14, 13, 12, 11, 10, 9],
  );
});

test('renders grade scores as typical offers', () => {
  assert.equal(gradeScoreToDisplay(18), 'A*A*A*');
  assert.equal(gradeScoreToDisplay(14), 'AAB');
  assert.equal(gradeScoreToDisplay(13.5), 'ABB');
  assert.equal(gradeScoreToDisplay(7), '(7)');
});
