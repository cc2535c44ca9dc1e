import { cellToNumber, cellToPercent } from './cells.js';
import { parseAlevelGrades, parseIbPoints } from './grade_parser.js';
import { buildMedicalSchools } from './medical_schools.js';
import { normalizeRankColumns, parseRank } from './rank_normalizer.js';
import { MEDICINE_DOMAIN, domainOfSubject, primarySubject } from './subject_classifier.js';
import { canonicalUniversity, isKnownCourseUniversity, toTitleCase } from './university_names.js';
import type {
  AdmissionsStats,
  CourseRecord,
  MedicalDetails,
  MedicalSchool,
  MergeReport,
  RawAdmissionsRow,
  RawExtracts,
  RawGlobalRankingRow,
  RawSubjectRankingRow,
} from './types.js';

interface GlobalRanking {
  qsGlobalRank: number | null;
  qsGlobalScore: number | null;
  theRank: number | null;
  theScore: number | null;
}

interface SubjectRanking {
  qsSubjectRank: number | null;
  qsSubjectScore: number | null;
}

export interface MergeResult {
  records: CourseRecord[];
  medSchools: MedicalSchool[];
  report: MergeReport;
}

const ADMISSIONS_SUMMARY_ROW = 'All';

/**
 * Builds one record per course row. Every join is left-preserving and a
 * duplicate key in a secondary table resolves to its first row, so the
 * output always has exactly as many records as there are course rows.
 */
export function mergeRecords(extracts: RawExtracts): MergeResult {
  const globalRankings = indexGlobalRankings(extracts.globalRankings);
  const subjectRankings = indexSubjectRankings(extracts.subjectRankings);
  const medSchools = buildMedicalSchools(extracts.medSchools);
  const medByUniversity = new Map(medSchools.map((school): [string, MedicalSchool] => [school.university, school]));
  const admissions = indexAdmissions(extracts.admissions);

  const unmapped = new Set<string>();
  const report: MergeReport = {
    courses: extracts.courses.length,
    unmappedUniversities: [],
    withGlobalRanking: 0,
    withSubjectRanking: 0,
    medicineCourses: 0,
    withMedicalData: 0,
    withAdmissions: 0,
  };

  const joined = extracts.courses.map((row) => {
    if (!isKnownCourseUniversity(row.university)) {
      unmapped.add(row.university.trim());
    }
    const university = canonicalUniversity(row.university, 'courses');
    const course = toTitleCase(row.course);
    const qsSubject = primarySubject(course);
    const domain = domainOfSubject(qsSubject);

    const global = globalRankings.get(university);
    const subject = qsSubject ? subjectRankings.get(subjectKey(university, qsSubject)) : undefined;
    const qsGlobalRank = global?.qsGlobalRank ?? null;
    const theRank = global?.theRank ?? null;

    const record: CourseRecord = {
      university,
      course,
      ucasCode: row.ucasCode,
      degreeLevel: row.degreeLevel,
      qualification: row.qualification,
      studyMode: row.studyMode,
      duration: row.duration,
      courseUrl: row.courseUrl,
      alevelGrades: row.alevelGrades,
      alevelScore: parseAlevelGrades(row.alevelGrades),
      ibPointsRaw: row.ibPoints,
      ibScore: parseIbPoints(row.ibPoints),
      domain,
      qsSubject,
      qsGlobalRank,
      qsGlobalScore: global?.qsGlobalScore ?? null,
      theRank,
      theScore: global?.theScore ?? null,
      bestGlobalRank: minPresent(qsGlobalRank, theRank),
      qsSubjectRank: subject?.qsSubjectRank ?? null,
      qsSubjectScore: subject?.qsSubjectScore ?? null,
      qsGlobalNorm: null,
      theNorm: null,
      qsSubjectNorm: null,
    };

    if (global) report.withGlobalRanking += 1;
    if (subject) report.withSubjectRanking += 1;

    if (domain === MEDICINE_DOMAIN) {
      report.medicineCourses += 1;
      const school = medByUniversity.get(university);
      if (school) {
        record.medical = toMedicalDetails(school);
        report.withMedicalData += 1;
      }
    }

    const stats = admissions.get(admissionsKey(university, course));
    if (stats) {
      record.admissions = stats;
      report.withAdmissions += 1;
    }

    return record;
  });

  const normalized = normalizeRankColumns(joined);
  const records = joined.map((record, index) => ({ ...record, ...normalized[index] }));
  report.unmappedUniversities = Array.from(unmapped).sort();

  return { records, medSchools, report };
}

function indexGlobalRankings(rows: readonly RawGlobalRankingRow[]): Map<string, GlobalRanking> {
  const index = new Map<string, GlobalRanking>();
  const seen = new Set<string>();
  for (const row of rows) {
    const university = canonicalUniversity(row.university, row.source);
    const sourceKey = `${row.source}\u0000${university}`;
    if (seen.has(sourceKey)) {
      continue;
    }
    seen.add(sourceKey);
    const entry = index.get(university) ?? { qsGlobalRank: null, qsGlobalScore: null, theRank: null, theScore: null };
    if (row.source === 'qs') {
      entry.qsGlobalRank = parseRank(row.rank);
      entry.qsGlobalScore = cellToNumber(row.score);
    } else {
      entry.theRank = parseRank(row.rank);
      entry.theScore = cellToNumber(row.score);
    }
    index.set(university, entry);
  }
  return index;
}

function indexSubjectRankings(rows: readonly RawSubjectRankingRow[]): Map<string, SubjectRanking> {
  const index = new Map<string, SubjectRanking>();
  for (const row of rows) {
    const key = subjectKey(canonicalUniversity(row.university, 'qs'), row.subject.trim());
    if (index.has(key)) {
      continue;
    }
    index.set(key, {
      qsSubjectRank: parseRank(row.rank),
      qsSubjectScore: cellToNumber(row.score),
    });
  }
  return index;
}

function indexAdmissions(rows: readonly RawAdmissionsRow[]): Map<string, AdmissionsStats> {
  const index = new Map<string, AdmissionsStats>();
  for (const row of rows) {
    if (row.course.trim() === ADMISSIONS_SUMMARY_ROW) {
      continue;
    }
    const key = admissionsKey(canonicalUniversity(row.university, 'admissions'), toTitleCase(row.course));
    if (index.has(key)) {
      continue;
    }
    index.set(key, {
      totalApplicants: cellToNumber(row.totalApplicants),
      ukApplicants: cellToNumber(row.ukApplicants),
      intlApplicants: cellToNumber(row.intlApplicants),
      totalOffers: cellToNumber(row.totalOffers),
      ukOffers: cellToNumber(row.ukOffers),
      intlOffers: cellToNumber(row.intlOffers),
      totalOfferPct: cellToPercent(row.totalOfferPct),
      ukOfferPct: cellToPercent(row.ukOfferPct),
      intlOfferPct: cellToPercent(row.intlOfferPct),
    });
  }
  return index;
}

function toMedicalDetails(school: MedicalSchool): MedicalDetails {
  const { university: _university, ...details } = school;
  return details;
}

function subjectKey(university: string, subject: string) {
  return `${university}\u0000${subject}`;
}

// Exact equality on title-cased names; no edit-distance matching.
function admissionsKey(university: string, course: string) {
  return `${university}\u0000${course}`;
}

function minPresent(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}
