import type Database from 'better-sqlite3';

import { SourceSchemaError } from '../errors.js';
import { cellToText } from '../pipeline/cells.js';
import type {
  GlobalRankingSource,
  MedSchoolSource,
  RawAdmissionsRow,
  RawCell,
  RawCourseRow,
  RawExtracts,
  RawGlobalRankingRow,
  RawMedSchoolRow,
  RawSubjectRankingRow,
} from '../pipeline/types.js';

export const SOURCE_TABLES = {
  courses: ['university', 'course', 'alevel_grades', 'ib_points', 'study_mode', 'duration', 'course_url'],
  rankings_global: ['university', 'source', 'rank', 'score'],
  rankings_subject: ['university', 'subject', 'rank', 'score'],
  med_schools: ['university', 'source'],
  admissions_stats: [
    'university',
    'course',
    'total_applicants',
    'uk_applicants',
    'intl_applicants',
    'total_offers',
    'uk_offers',
    'intl_offers',
    'total_offer_pct',
    'uk_offer_pct',
    'intl_offer_pct',
  ],
} as const;

export type SourceTable = keyof typeof SOURCE_TABLES;

export const SOURCE_TABLE_NAMES: readonly SourceTable[] = [
  'courses',
  'rankings_global',
  'rankings_subject',
  'med_schools',
  'admissions_stats',
];

export interface SchemaProblem {
  table: SourceTable;
  missingColumns: string[];
  tableMissing: boolean;
}

type SqlRow = Record<string, unknown>;

const GLOBAL_SOURCES: readonly GlobalRankingSource[] = ['qs', 'the'];
const MED_SOURCES: readonly MedSchoolSource[] = ['council', 'stats'];

/**
 * Lists every source table that is absent or lacks a required column.
 */
export function findSchemaProblems(db: Database.Database): SchemaProblem[] {
  const problems: SchemaProblem[] = [];
  for (const table of SOURCE_TABLE_NAMES) {
    const required: readonly string[] = SOURCE_TABLES[table];
    const columns = readColumns(db, table);
    if (!columns.size) {
      problems.push({ table, missingColumns: [...required], tableMissing: true });
      continue;
    }
    const missingColumns = required.filter((column) => !columns.has(column));
    if (missingColumns.length) {
      problems.push({ table, missingColumns, tableMissing: false });
    }
  }
  return problems;
}

export function assertSourceSchema(db: Database.Database) {
  const [problem] = findSchemaProblems(db);
  if (!problem) {
    return;
  }
  if (problem.tableMissing) {
    throw new SourceSchemaError(problem.table, null, `Source table "${problem.table}" is missing`);
  }
  const column = problem.missingColumns[0] ?? null;
  throw new SourceSchemaError(
    problem.table,
    column,
    `Source table "${problem.table}" is missing required column "${column}"`,
  );
}

export function readRawExtracts(db: Database.Database): RawExtracts {
  assertSourceSchema(db);
  return {
    courses: readRows(db, 'courses').map(toCourseRow),
    globalRankings: readRows(db, 'rankings_global').map(toGlobalRankingRow),
    subjectRankings: readRows(db, 'rankings_subject')
      .map(toSubjectRankingRow)
      .filter((row): row is RawSubjectRankingRow => row !== null),
    medSchools: readRows(db, 'med_schools').map(toMedSchoolRow),
    admissions: readRows(db, 'admissions_stats')
      .map(toAdmissionsRow)
      .filter((row): row is RawAdmissionsRow => row !== null),
  };
}

function readColumns(db: Database.Database, table: SourceTable): Set<string> {
  const rows = db.prepare('SELECT name FROM pragma_table_info(?)').all(table) as Array<{ name: string }>;
  return new Set(rows.map((row) => row.name));
}

function readRows(db: Database.Database, table: SourceTable): SqlRow[] {
  return db.prepare(`SELECT * FROM ${table} ORDER BY rowid`).all() as SqlRow[];
}

function toCourseRow(row: SqlRow, index: number): RawCourseRow {
  const university = cellToText(row.university);
  if (!university) {
    throw new SourceSchemaError('courses', 'university', `Source table "courses" row ${index + 1} has no university`);
  }
  return {
    university,
    course: cellToText(row.course) ?? '',
    alevelGrades: cellToText(row.alevel_grades),
    ibPoints: cellToText(row.ib_points),
    studyMode: cellToText(row.study_mode),
    duration: cellToText(row.duration),
    courseUrl: cellToText(row.course_url),
    ucasCode: cellToText(row.ucas_code),
    degreeLevel: cellToText(row.degree_level),
    qualification: cellToText(row.qualification),
  };
}

function toGlobalRankingRow(row: SqlRow, index: number): RawGlobalRankingRow {
  const source = readEnum(row.source, GLOBAL_SOURCES, 'rankings_global', index);
  return {
    university: cellToText(row.university) ?? '',
    source,
    rank: toRawCell(row.rank),
    score: toRawCell(row.score),
  };
}

function toSubjectRankingRow(row: SqlRow): RawSubjectRankingRow | null {
  const university = cellToText(row.university);
  const subject = cellToText(row.subject);
  if (!university || !subject) {
    return null;
  }
  return { university, subject, rank: toRawCell(row.rank), score: toRawCell(row.score) };
}

function toMedSchoolRow(row: SqlRow, index: number): RawMedSchoolRow {
  return {
    university: cellToText(row.university) ?? '',
    source: readEnum(row.source, MED_SOURCES, 'med_schools', index),
    course: cellToText(row.course),
    alevelReq: cellToText(row.alevel_req),
    ibReq: cellToText(row.ib_req),
    gcseReq: cellToText(row.gcse_req),
    admissionTest: cellToText(row.admission_test),
    interviewType: cellToText(row.interview_type),
    teachingStyle: cellToText(row.teaching_style),
    workExperience: cellToText(row.work_experience),
    singaporeApproved: cellToText(row.singapore_approved),
    url: cellToText(row.url),
    location: cellToText(row.location),
    intlApplicants: toRawCell(row.intl_applicants),
    intlOffers: toRawCell(row.intl_offers),
    intlOfferPct: toRawCell(row.intl_offer_pct),
    intlPlaces: toRawCell(row.intl_places),
  };
}

function toAdmissionsRow(row: SqlRow): RawAdmissionsRow | null {
  const university = cellToText(row.university);
  const course = cellToText(row.course);
  if (!university || !course) {
    return null;
  }
  return {
    university,
    course,
    totalApplicants: toRawCell(row.total_applicants),
    ukApplicants: toRawCell(row.uk_applicants),
    intlApplicants: toRawCell(row.intl_applicants),
    totalOffers: toRawCell(row.total_offers),
    ukOffers: toRawCell(row.uk_offers),
    intlOffers: toRawCell(row.intl_offers),
    totalOfferPct: toRawCell(row.total_offer_pct),
    ukOfferPct: toRawCell(row.uk_offer_pct),
    intlOfferPct: toRawCell(row.intl_offer_pct),
  };
}

function readEnum<T extends string>(value: unknown, allowed: readonly T[], table: SourceTable, index: number): T {
  const normalized = cellToText(value)?.toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new SourceSchemaError(
      table,
      'source',
      `Source table "${table}" row ${index + 1} has unknown source "${String(value)}" (expected ${allowed.join(' or ')})`,
    );
  }
  return match;
}

function toRawCell(value: unknown): RawCell {
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return null;
}
