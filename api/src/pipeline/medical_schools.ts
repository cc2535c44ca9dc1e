import { cellToNumber, cellToPercent } from './cells.js';
import { canonicalUniversity } from './university_names.js';
import type { AdmissionTestCategory, MedicalSchool, RawMedSchoolRow } from './types.js';

const STATS_REFERENCE_MARKER = 'reference';

// Any test other than UCAT (BMAT, GAMSAT) falls under Other.
export function categorizeAdmissionTest(text: string | null | undefined): AdmissionTestCategory {
  if (!text || !text.trim()) {
    return 'Unknown';
  }
  return text.toLowerCase().includes('ucat') ? 'UCAT' : 'Other';
}

/**
 * Combines council requirement rows with applicant statistics rows into one
 * entry per university. Either side may be missing for a school. Statistics
 * rows labelled as references are not schools and are skipped.
 */
export function buildMedicalSchools(rows: readonly RawMedSchoolRow[]): MedicalSchool[] {
  const council = new Map<string, RawMedSchoolRow>();
  const stats = new Map<string, RawMedSchoolRow>();
  const universities = new Set<string>();

  for (const row of rows) {
    if (row.source === 'stats' && row.university.toLowerCase().includes(STATS_REFERENCE_MARKER)) {
      continue;
    }
    const university = canonicalUniversity(row.university, row.source === 'council' ? 'medCouncil' : 'medStats');
    const target = row.source === 'council' ? council : stats;
    if (target.has(university)) {
      continue;
    }
    target.set(university, row);
    universities.add(university);
  }

  return Array.from(universities, (university) => {
    const requirements = council.get(university);
    const applicants = stats.get(university);
    return {
      university,
      course: requirements?.course ?? null,
      alevelReq: requirements?.alevelReq ?? null,
      ibReq: requirements?.ibReq ?? null,
      gcseReq: requirements?.gcseReq ?? null,
      admissionTest: requirements?.admissionTest ?? null,
      testCategory: categorizeAdmissionTest(requirements?.admissionTest),
      interviewType: requirements?.interviewType ?? null,
      teachingStyle: requirements?.teachingStyle ?? null,
      workExperience: requirements?.workExperience ?? null,
      singaporeApproved: requirements?.singaporeApproved ?? null,
      url: requirements?.url ?? null,
      location: requirements?.location ?? null,
      intlApplicants: cellToNumber(applicants?.intlApplicants),
      intlOffers: cellToNumber(applicants?.intlOffers),
      intlOfferPct: cellToPercent(applicants?.intlOfferPct),
      intlPlaces: cellToNumber(applicants?.intlPlaces),
    };
  });
}
