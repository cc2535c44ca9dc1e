import type { AdmissionTestCategory, MedicalSchool } from '../pipeline/types.js';

export interface MedSchoolFilter {
  universities?: string[];
  testCategories?: AdmissionTestCategory[];
  /** Keep only schools approved by the Singapore Medical Council. */
  smcOnly?: boolean;
}

export function listMedicalSchools(schools: readonly MedicalSchool[], filter: MedSchoolFilter): MedicalSchool[] {
  const universities = filter.universities?.length ? new Set(filter.universities) : null;
  const categories = filter.testCategories?.length ? new Set(filter.testCategories) : null;

  return schools.filter((school) => {
    if (universities && !universities.has(school.university)) return false;
    if (categories && !categories.has(school.testCategory)) return false;
    if (filter.smcOnly && !(school.singaporeApproved ?? '').toLowerCase().includes('yes')) return false;
    return true;
  });
}
