import { stringify } from 'csv-stringify/sync';

import type { CourseRecord } from '../pipeline/types.js';
import { rankCourses, type CourseRankingQuery, type ScoredCourse } from './course_search.js';

export const EXPORT_MAX_ROWS = 500;
export const EXPORT_DEFAULT_ROWS = 50;

const EXPORT_COLUMNS: ReadonlyArray<{ header: string; value: (record: ScoredCourse) => string | number | null }> = [
  { header: 'university', value: (record) => record.university },
  { header: 'course', value: (record) => record.course },
  { header: 'domain', value: (record) => record.domain },
  { header: 'qs_subject', value: (record) => record.qsSubject },
  { header: 'alevel_grades', value: (record) => record.alevelGrades },
  { header: 'alevel_score', value: (record) => record.alevelScore },
  { header: 'ib_points', value: (record) => record.ibPointsRaw },
  { header: 'ib_score', value: (record) => record.ibScore },
  { header: 'study_mode', value: (record) => record.studyMode },
  { header: 'duration', value: (record) => record.duration },
  { header: 'qs_global_rank', value: (record) => record.qsGlobalRank },
  { header: 'the_rank', value: (record) => record.theRank },
  { header: 'qs_subject_rank', value: (record) => record.qsSubjectRank },
  { header: 'weighted_score', value: (record) => roundScore(record.weightedScore) },
  { header: 'total_offer_pct', value: (record) => record.admissions?.totalOfferPct ?? null },
  { header: 'course_url', value: (record) => record.courseUrl },
];

export interface CourseExport {
  csv: string;
  exported: number;
  total: number;
}

/**
 * Ranks the matching courses the same way the listing does and writes the
 * first `limit` of them as CSV. Absent values become empty cells.
 */
export function exportCourses(records: readonly CourseRecord[], query: CourseRankingQuery, limit: number): CourseExport {
  const ranked = rankCourses(records, query);
  const rows = ranked
    .slice(0, limit)
    .map((record) => Object.fromEntries(EXPORT_COLUMNS.map((column) => [column.header, column.value(record)])));
  const csv = stringify(rows, {
    header: true,
    columns: EXPORT_COLUMNS.map((column) => column.header),
  });
  return { csv, exported: rows.length, total: ranked.length };
}

function roundScore(score: number | null) {
  return score === null ? null : Math.round(score * 100) / 100;
}
