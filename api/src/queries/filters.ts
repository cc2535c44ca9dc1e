import { ALEVEL_GRADE_OPTIONS, IB_POINTS_OPTIONS } from '../pipeline/grade_parser.js';
import type { AdmissionTestCategory, CourseRecord, MedicalSchool } from '../pipeline/types.js';

export interface ScoreRange {
  min: number;
  max: number;
}

export interface FilterOptionsResult {
  universities: string[];
  domains: string[];
  studyModes: string[];
  durations: string[];
  alevelScoreRange: ScoreRange;
  ibScoreRange: ScoreRange;
  alevelGradeOptions: Array<{ label: string; score: number }>;
  ibPointsOptions: number[];
  medSchoolUniversities: string[];
  admissionTestCategories: AdmissionTestCategory[];
}

const DEFAULT_ALEVEL_RANGE: ScoreRange = { min: 0, max: 18 };
const DEFAULT_IB_RANGE: ScoreRange = { min: 24, max: 45 };

export function getFilterOptions(
  records: readonly CourseRecord[],
  medSchools: readonly MedicalSchool[] = [],
): FilterOptionsResult {
  return {
    universities: distinctSorted(records.map((record) => record.university)),
    domains: distinctSorted(records.map((record) => record.domain)),
    studyModes: distinctSorted(records.map((record) => record.studyMode)),
    durations: distinctSorted(records.map((record) => record.duration)),
    alevelScoreRange: rangeOf(records.map((record) => record.alevelScore), DEFAULT_ALEVEL_RANGE),
    ibScoreRange: rangeOf(records.map((record) => record.ibScore), DEFAULT_IB_RANGE),
    alevelGradeOptions: ALEVEL_GRADE_OPTIONS.map((option) => ({ ...option })),
    ibPointsOptions: [...IB_POINTS_OPTIONS],
    medSchoolUniversities: distinctSorted(medSchools.map((school) => school.university)),
    admissionTestCategories: distinctSorted(medSchools.map((school) => school.testCategory)),
  };
}

function distinctSorted<T extends string>(values: Array<T | null>): T[] {
  const seen = new Set<T>();
  for (const value of values) {
    if (value) seen.add(value);
  }
  return Array.from(seen).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function rangeOf(values: Array<number | null>, fallback: ScoreRange): ScoreRange {
  const present = values.filter((value): value is number => value !== null);
  if (!present.length) {
    return { ...fallback };
  }
  return { min: Math.min(...present), max: Math.max(...present) };
}
