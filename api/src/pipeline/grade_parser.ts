/**
 * Entry requirement parsing. Scores are ordinal tallies meant for relative
 * comparison only (higher = harder); they are not UCAS tariff points.
 */

const ALEVEL_GRADE_VALUES: Record<string, number> = {
  'A*': 6,
  A: 5,
  B: 4,
  C: 3,
  D: 2,
  E: 1,
};

const ALEVEL_GRADE_PATTERN = /A\*|[A-E]/g;
const BLANK_VALUES = new Set(['', 'nan', 'not accepted']);

const IB_MIN_POINTS = 20;
const IB_MAX_POINTS = 45;

export const ALEVEL_GRADE_OPTIONS: ReadonlyArray<{ label: string; score: number }> = Array.from(
  { length: 18 - 9 + 1 },
  (_, index) => {
    const score = 18 - index;
    return { label: `${gradeScoreToDisplay(score)} (${score})`, score };
  },
);

export const IB_POINTS_OPTIONS: readonly number[] = Array.from({ length: 45 - 24 + 1 }, (_, index) => 45 - index);

/**
 * "A*A*A" -> 17, "ABB-BBB" -> 13 (the part before the hyphen), "Not accepted" -> null.
 */
export function parseAlevelGrades(input: string | null | undefined): number | null {
  const text = normalizeRequirementText(input);
  if (text === null) {
    return null;
  }

  let candidate = text;
  if (candidate.includes('-') && !candidate.startsWith('-')) {
    const [higherEnd] = candidate.split('-');
    if (higherEnd !== undefined && /[A-E*]/.test(higherEnd)) {
      candidate = higherEnd.trim();
    }
  }

  const grades = candidate.match(ALEVEL_GRADE_PATTERN);
  if (!grades) {
    return null;
  }
  const total = grades.reduce((sum, grade) => sum + (ALEVEL_GRADE_VALUES[grade] ?? 0), 0);
  return total > 0 ? total : null;
}

/**
 * Takes the first number in the text, so "38-40 points" yields the floor (38).
 */
export function parseIbPoints(input: string | null | undefined): number | null {
  const text = normalizeRequirementText(input);
  if (text === null) {
    return null;
  }
  const match = /\d+/.exec(text);
  if (!match) {
    return null;
  }
  const points = Number.parseInt(match[0], 10);
  return points >= IB_MIN_POINTS && points <= IB_MAX_POINTS ? points : null;
}

export function gradeScoreToDisplay(score: number): string {
  if (score >= 18) return 'A*A*A*';
  if (score >= 17) return 'A*A*A';
  if (score >= 16) return 'A*AA';
  if (score >= 15) return 'AAA';
  if (score >= 14) return 'AAB';
  if (score >= 13) return 'ABB';
  if (score >= 12) return 'BBB';
  if (score >= 11) return 'BBC';
  if (score >= 10) return 'BCC';
  if (score >= 9) return 'CCC';
  return `(${score})`;
}

function normalizeRequirementText(input: string | null | undefined): string | null {
  if (input === null || input === undefined) {
    return null;
  }
  const trimmed = String(input).trim();
  return BLANK_VALUES.has(trimmed.toLowerCase()) ? null : trimmed;
}
