import type { CourseRecord } from '../pipeline/types.js';
import { summarizeCourses, type CourseSearchSummary } from './course_search.js';

export interface UniversityOverview {
  university: string;
  courses: number;
  domains: number;
  qsGlobalRank: number | null;
  theRank: number | null;
}

export interface OverviewResult {
  totals: CourseSearchSummary & {
    withAdmissions: number;
    withCourseUrl: number;
  };
  universities: UniversityOverview[];
}

/**
 * Landing statistics: totals across the master set and one row per university, best QS rank first.
 */
export function summarizeOverview(records: readonly CourseRecord[]): OverviewResult {
  const byUniversity = new Map<string, { courses: number; domains: Set<string>; first: CourseRecord }>();
  for (const record of records) {
    const entry = byUniversity.get(record.university);
    if (entry) {
      entry.courses += 1;
      entry.domains.add(record.domain);
    } else {
      byUniversity.set(record.university, { courses: 1, domains: new Set([record.domain]), first: record });
    }
  }

  const universities = Array.from(byUniversity, ([university, entry]) => ({
    university,
    courses: entry.courses,
    domains: entry.domains.size,
    qsGlobalRank: entry.first.qsGlobalRank,
    theRank: entry.first.theRank,
  })).sort((a, b) => {
    if (a.qsGlobalRank === null || b.qsGlobalRank === null) {
      if (a.qsGlobalRank === b.qsGlobalRank) return a.university < b.university ? -1 : 1;
      return a.qsGlobalRank === null ? 1 : -1;
    }
    return a.qsGlobalRank - b.qsGlobalRank;
  });

  return {
    totals: {
      ...summarizeCourses(records),
      withAdmissions: records.filter((record) => record.admissions !== undefined).length,
      withCourseUrl: records.filter((record) => record.courseUrl !== null).length,
    },
    universities,
  };
}
