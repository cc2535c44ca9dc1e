import { scoreRecords, type Scored } from '../pipeline/composite_score.js';
import { parseAlevelGrades } from '../pipeline/grade_parser.js';
import type { CourseRecord } from '../pipeline/types.js';
import type { CoursesQuery } from '../routes/courses.js';

export type ScoredCourse = Scored<CourseRecord>;

/** The filter, weight and sort part of a course query, shared by listing and export. */
export type CourseRankingQuery = Omit<CoursesQuery, 'page' | 'pageSize' | 'groupBy'>;

export type SortDirection = 'asc' | 'desc';

export const SORT_KEYS = [
  'weightedScore',
  'qsGlobalRank',
  'theRank',
  'qsSubjectRank',
  'bestGlobalRank',
  'alevelScore',
  'ibScore',
  'course',
  'university',
  'totalOfferPct',
] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export const GROUP_KEYS = ['university', 'domain', 'qsSubject', 'studyMode', 'duration'] as const;

export type GroupKey = (typeof GROUP_KEYS)[number];

export type SearchField = 'course' | 'university' | 'qsSubject' | 'domain';

export const UNGROUPED_LABEL = 'Unclassified';

export const DEFAULT_GLOBAL_WEIGHT = 0.5;

const SORT_ACCESSORS: Record<SortKey, (record: ScoredCourse) => number | string | null> = {
  weightedScore: (record) => record.weightedScore,
  qsGlobalRank: (record) => record.qsGlobalRank,
  theRank: (record) => record.theRank,
  qsSubjectRank: (record) => record.qsSubjectRank,
  bestGlobalRank: (record) => record.bestGlobalRank,
  alevelScore: (record) => record.alevelScore,
  ibScore: (record) => record.ibScore,
  course: (record) => record.course,
  university: (record) => record.university,
  totalOfferPct: (record) => record.admissions?.totalOfferPct ?? null,
};

export const SORT_DEFAULT_DIRECTION: Record<SortKey, SortDirection> = {
  weightedScore: 'desc',
  qsGlobalRank: 'asc',
  theRank: 'asc',
  qsSubjectRank: 'asc',
  bestGlobalRank: 'asc',
  alevelScore: 'desc',
  ibScore: 'desc',
  course: 'asc',
  university: 'asc',
  totalOfferPct: 'asc',
};

export interface CoursePredicates {
  universities?: string[];
  domains?: string[];
  studyModes?: string[];
  durations?: string[];
  /** Grade score the applicant holds; courses asking for more are dropped. */
  maxAlevelScore?: number;
  maxIbScore?: number;
  search?: string;
}

export interface SearchKeywords {
  includes: string[];
  excludes: string[];
}

export interface CourseSearchSummary {
  courses: number;
  universities: number;
  domains: number;
  withSubjectRankings: number;
}

export interface CourseGroup {
  key: string;
  count: number;
  records: ScoredCourse[];
}

export interface CourseSearchResult {
  data: ScoredCourse[];
  total: number;
  groups?: CourseGroup[];
  summary: CourseSearchSummary;
}

/**
 * "comp, phys, -philo" -> includes ["comp", "phys"], excludes ["philo"].
 * Commas, when present, keep multi-word phrases together; otherwise every word is a token.
 */
export function parseSearchKeywords(query: string | null | undefined): SearchKeywords {
  const keywords: SearchKeywords = { includes: [], excludes: [] };
  if (!query || !query.trim()) {
    return keywords;
  }
  const tokens = query.includes(',') ? query.split(',') : query.split(/\s+/);
  for (const raw of tokens) {
    const token = raw.trim();
    if (!token) {
      continue;
    }
    if (token.startsWith('-') && token.length > 1) {
      keywords.excludes.push(token.slice(1).trim().toLowerCase());
    } else {
      keywords.includes.push(token.toLowerCase());
    }
  }
  return keywords;
}

export function matchesKeywords(text: string | null, keywords: SearchKeywords): boolean {
  const haystack = (text ?? '').toLowerCase();
  return (
    keywords.includes.every((keyword) => haystack.includes(keyword)) &&
    !keywords.excludes.some((keyword) => haystack.includes(keyword))
  );
}

export function searchRecords<T extends CourseRecord>(records: readonly T[], field: SearchField, query: string): T[] {
  const keywords = parseSearchKeywords(query);
  if (!keywords.includes.length && !keywords.excludes.length) {
    return [...records];
  }
  return records.filter((record) => matchesKeywords(record[field], keywords));
}

export function filterRecords<T extends CourseRecord>(records: readonly T[], predicates: CoursePredicates): T[] {
  const universities = toFilterSet(predicates.universities);
  const domains = toFilterSet(predicates.domains);
  const studyModes = toFilterSet(predicates.studyModes);
  const durations = toFilterSet(predicates.durations);
  const keywords = parseSearchKeywords(predicates.search);
  const hasKeywords = keywords.includes.length > 0 || keywords.excludes.length > 0;
  const { maxAlevelScore, maxIbScore } = predicates;

  return records.filter((record) => {
    if (universities && !universities.has(record.university)) return false;
    if (domains && !domains.has(record.domain)) return false;
    if (studyModes && (record.studyMode === null || !studyModes.has(record.studyMode))) return false;
    if (durations && (record.duration === null || !durations.has(record.duration))) return false;
    if (hasKeywords && !matchesKeywords(record.course, keywords)) return false;
    // An unknown requirement is kept rather than treated as unmet.
    if (maxAlevelScore !== undefined && record.alevelScore !== null && record.alevelScore > maxAlevelScore) {
      return false;
    }
    if (maxIbScore !== undefined && record.ibScore !== null && record.ibScore > maxIbScore) {
      return false;
    }
    return true;
  });
}

/**
 * Stable sort; null values always trail, whichever the direction.
 */
export function sortRecords(records: readonly ScoredCourse[], key: SortKey, direction: SortDirection): ScoredCourse[] {
  const accessor = SORT_ACCESSORS[key];
  const factor = direction === 'asc' ? 1 : -1;
  return [...records].sort((left, right) => {
    const a = accessor(left);
    const b = accessor(right);
    if (a === null || b === null) {
      if (a === b) return 0;
      return a === null ? 1 : -1;
    }
    return compareValues(a, b) * factor;
  });
}

/**
 * Partitions records by a categorical key. The returned map iterates in ascending key order.
 */
export function groupRecords<T extends CourseRecord>(records: readonly T[], key: GroupKey): Map<string, T[]> {
  const buckets = new Map<string, T[]>();
  for (const record of records) {
    const label: string = record[key] ?? UNGROUPED_LABEL;
    const bucket = buckets.get(label);
    if (bucket) {
      bucket.push(record);
    } else {
      buckets.set(label, [record]);
    }
  }
  const orderedKeys = Array.from(buckets.keys()).sort(compareValues);
  return new Map(orderedKeys.map((label): [string, T[]] => [label, buckets.get(label) ?? []]));
}

export function summarizeCourses(records: readonly CourseRecord[]): CourseSearchSummary {
  return {
    courses: records.length,
    universities: new Set(records.map((record) => record.university)).size,
    domains: new Set(records.map((record) => record.domain)).size,
    withSubjectRankings: records.filter((record) => record.qsSubjectRank !== null).length,
  };
}

export function rankCourses(records: readonly CourseRecord[], query: CourseRankingQuery): ScoredCourse[] {
  const filtered = filterRecords(records, buildPredicates(query));
  const scored = scoreRecords(filtered, query.weight ?? DEFAULT_GLOBAL_WEIGHT);
  const { key, direction } = resolveSort(query.sortBy, query.sortDir);
  return sortRecords(scored, key, direction);
}

export function executeCourseSearch(records: readonly CourseRecord[], query: CoursesQuery): CourseSearchResult {
  const sorted = rankCourses(records, query);
  const summary = summarizeCourses(sorted);

  if (query.groupBy) {
    const groups = Array.from(groupRecords(sorted, query.groupBy), ([label, members]) => ({
      key: label,
      count: members.length,
      records: members,
    }));
    return { data: [], total: sorted.length, groups, summary };
  }

  const offset = (query.page - 1) * query.pageSize;
  return {
    data: sorted.slice(offset, offset + query.pageSize),
    total: sorted.length,
    summary,
  };
}

export function buildPredicates(query: CourseRankingQuery): CoursePredicates {
  const alevelScore = query.grades ? parseAlevelGrades(query.grades) : null;
  return {
    universities: query.university,
    domains: query.domain,
    studyModes: query.studyMode,
    durations: query.duration,
    maxAlevelScore: alevelScore ?? undefined,
    maxIbScore: query.ibPoints,
    search: query.q,
  };
}

function resolveSort(sortBy: SortKey | undefined, sortDir: SortDirection | undefined) {
  const key = sortBy ?? 'weightedScore';
  return { key, direction: sortDir ?? SORT_DEFAULT_DIRECTION[key] };
}

function toFilterSet(values: string[] | undefined): Set<string> | null {
  return values && values.length ? new Set(values) : null;
}

function compareValues(a: number | string, b: number | string): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
