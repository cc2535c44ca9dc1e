import type { Domain } from './subject_classifier.js';

export type RawCell = string | number | null;

export interface RawCourseRow {
  university: string;
  course: string;
  alevelGrades: string | null;
  ibPoints: string | null;
  studyMode: string | null;
  duration: string | null;
  courseUrl: string | null;
  ucasCode: string | null;
  degreeLevel: string | null;
  qualification: string | null;
}

export type GlobalRankingSource = 'qs' | 'the';

export interface RawGlobalRankingRow {
  university: string;
  source: GlobalRankingSource;
  rank: RawCell;
  score: RawCell;
}

export interface RawSubjectRankingRow {
  university: string;
  subject: string;
  rank: RawCell;
  score: RawCell;
}

export type MedSchoolSource = 'council' | 'stats';

export interface RawMedSchoolRow {
  university: string;
  source: MedSchoolSource;
  course: string | null;
  alevelReq: string | null;
  ibReq: string | null;
  gcseReq: string | null;
  admissionTest: string | null;
  interviewType: string | null;
  teachingStyle: string | null;
  workExperience: string | null;
  singaporeApproved: string | null;
  url: string | null;
  location: string | null;
  intlApplicants: RawCell;
  intlOffers: RawCell;
  intlOfferPct: RawCell;
  intlPlaces: RawCell;
}

export interface RawAdmissionsRow {
  university: string;
  course: string;
  totalApplicants: RawCell;
  ukApplicants: RawCell;
  intlApplicants: RawCell;
  totalOffers: RawCell;
  ukOffers: RawCell;
  intlOffers: RawCell;
  totalOfferPct: RawCell;
  ukOfferPct: RawCell;
  intlOfferPct: RawCell;
}

export interface RawExtracts {
  courses: RawCourseRow[];
  globalRankings: RawGlobalRankingRow[];
  subjectRankings: RawSubjectRankingRow[];
  medSchools: RawMedSchoolRow[];
  admissions: RawAdmissionsRow[];
}

export type AdmissionTestCategory = 'UCAT' | 'Other' | 'Unknown';

export interface MedicalDetails {
  course: string | null;
  alevelReq: string | null;
  ibReq: string | null;
  gcseReq: string | null;
  admissionTest: string | null;
  testCategory: AdmissionTestCategory;
  interviewType: string | null;
  teachingStyle: string | null;
  workExperience: string | null;
  singaporeApproved: string | null;
  url: string | null;
  location: string | null;
  intlApplicants: number | null;
  intlOffers: number | null;
  intlOfferPct: number | null;
  intlPlaces: number | null;
}

export interface MedicalSchool extends MedicalDetails {
  university: string;
}

export interface AdmissionsStats {
  totalApplicants: number | null;
  ukApplicants: number | null;
  intlApplicants: number | null;
  totalOffers: number | null;
  ukOffers: number | null;
  intlOffers: number | null;
  totalOfferPct: number | null;
  ukOfferPct: number | null;
  intlOfferPct: number | null;
}

export interface CourseRecord {
  university: string;
  course: string;
  ucasCode: string | null;
  degreeLevel: string | null;
  qualification: string | null;
  studyMode: string | null;
  duration: string | null;
  courseUrl: string | null;
  alevelGrades: string | null;
  alevelScore: number | null;
  ibPointsRaw: string | null;
  ibScore: number | null;
  domain: Domain;
  qsSubject: string | null;
  qsGlobalRank: number | null;
  qsGlobalScore: number | null;
  theRank: number | null;
  theScore: number | null;
  bestGlobalRank: number | null;
  qsSubjectRank: number | null;
  qsSubjectScore: number | null;
  qsGlobalNorm: number | null;
  theNorm: number | null;
  qsSubjectNorm: number | null;
  medical?: MedicalDetails;
  admissions?: AdmissionsStats;
}

export interface MergeReport {
  courses: number;
  unmappedUniversities: string[];
  withGlobalRanking: number;
  withSubjectRanking: number;
  medicineCourses: number;
  withMedicalData: number;
  withAdmissions: number;
}

export interface MasterRecordSet {
  records: readonly CourseRecord[];
  medSchools: readonly MedicalSchool[];
  report: MergeReport;
  loadedAt: Date;
}
