import test from 'node:test';
import assert from 'node:assert/strict';

import { mergeRecords } from '../src/pipeline/record_merger.js';
import type { RawCourseRow, RawExtracts, RawMedSchoolRow } from '../src/pipeline/types.js';
import { mergeSampleSources } from './fixtures/sourceDb.js';

function assertClose(actual: number | null | undefined, expected: number) {
  assert.equal(typeof actual, 'number');
  assert.ok(Math.abs(Number(actual) - expected) < 1e-9, `expected ${expected}, received ${actual}`);
}

test('produces one record per course row with canonical names', () => {
  const { records } = mergeSampleSources();
  assert.equal(records.length, 5);
  assert.deepEqual(
    records.map((record) => [record.university, record.course]),
    [
      ['University College London', 'Computer Science'],
      ['University of Oxford', 'Medicine'],
      ['University of Oxford', 'History And Politics'],
      ["King's College London", 'Law'],
      ['University of Warwick', 'Mathematics'],
    ],
  );
});

test('derives subjects, domains and grade scores', () => {
  const { records } = mergeSampleSources();
  assert.deepEqual(
    records.map((record) => [record.qsSubject, record.domain, record.alevelScore, record.ibScore]),
    [
      ['Computer Science', 'Computing & Technology', 17, 40],
      ['Medicine', 'Medicine & Health', 16, 39],
      ['Politics', 'Social Sciences', 15, 38],
      ['Law', 'Law', 16, null],
      ['Mathematics', 'Mathematics & Statistics', null, 38],
    ],
  );
});

test('joins global and subject rankings, first row per key winning', () => {
  const { records } = mergeSampleSources();
  const [ucl, medicine, history, law, maths] = records;
  assert.ok(ucl && medicine && history && law && maths);

  assert.equal(medicine.qsGlobalRank, 1);
  assert.equal(medicine.qsGlobalScore, 100);
  assert.equal(medicine.theRank, 1);
  assert.equal(medicine.theScore, 98.5);
  assert.equal(law.qsGlobalRank, 51);
  assert.equal(law.theRank, 38);
  assert.equal(law.bestGlobalRank, 38);
  assert.equal(ucl.bestGlobalRank, 11);
  assert.equal(maths.theRank, null);
  assert.equal(maths.bestGlobalRank, 101);

  assert.deepEqual(
    records.map((record) => record.qsSubjectRank),
    [5, 1, 9, 9, null],
  );
});

test('normalizes rank columns across the merged set', () => {
  const { records } = mergeSampleSources();
  const [ucl, medicine, history, law, maths] = records;
  assert.ok(ucl && medicine && history && law && maths);

  assert.equal(medicine.qsGlobalNorm, 100);
  assert.equal(law.qsGlobalNorm, 50);
  assert.equal(maths.qsGlobalNorm, 0);
  assertClose(ucl.qsGlobalNorm, 90);
  assertClose(ucl.theNorm, (100 * 17) / 37);
  assert.equal(law.theNorm, 0);
  assert.equal(maths.theNorm, null);
  assert.equal(ucl.qsSubjectNorm, 50);
  assert.equal(medicine.qsSubjectNorm, 100);
  assert.equal(history.qsSubjectNorm, 0);
  assert.equal(maths.qsSubjectNorm, null);
});

test('attaches medical school details only to medicine courses', () => {
  const { records, medSchools } = mergeSampleSources();
  const [, medicine, history] = records;
  assert.ok(medicine && history);

  assert.ok(medicine.medical);
  assert.equal(medicine.medical.course, 'A100 Medicine');
  assert.equal(medicine.medical.testCategory, 'UCAT');
  assert.equal(medicine.medical.intlApplicants, 1200);
  assert.equal(medicine.medical.intlOffers, 30);
  assert.equal(medicine.medical.intlOfferPct, 2.5);
  assert.equal('university' in medicine.medical, false);
  assert.equal('medical' in history, false);

  assert.deepEqual(
    medSchools.map((school) => [school.university, school.testCategory]),
    [
      ['University of Oxford', 'UCAT'],
      ['Queen Mary University of London', 'Other'],
      ['Newcastle University', 'Unknown'],
    ],
  );
});

test('joins admissions statistics on title-cased course names', () => {
  const { records } = mergeSampleSources();
  const [, , history, law] = records;
  assert.ok(history && law);

  assert.deepEqual(history.admissions, {
    totalApplicants: 1500,
    ukApplicants: 1100,
    intlApplicants: 400,
    totalOffers: 190,
    ukOffers: 160,
    intlOffers: 30,
    totalOfferPct: 12.5,
    ukOfferPct: 14.5,
    intlOfferPct: 7.5,
  });
  assert.equal('admissions' in law, false);
});

test('reports join coverage', () => {
  const { report } = mergeSampleSources();
  assert.deepEqual(report, {
    courses: 5,
    unmappedUniversities: [],
    withGlobalRanking: 5,
    withSubjectRanking: 4,
    medicineCourses: 1,
    withMedicalData: 1,
    withAdmissions: 1,
  });
});

test('keeps unmatched courses and flags unknown universities', () => {
  const extracts: RawExtracts = {
    courses: [
      courseRow('University of Somewhere ', 'dentistry'),
      courseRow('University of Oxford', 'law'),
      courseRow('University of Oxford', 'all'),
    ],
    globalRankings: [
      { university: 'University of Oxford', source: 'qs', rank: '2', score: null },
      { university: 'University of Oxford', source: 'qs', rank: '3', score: null },
    ],
    subjectRankings: [
      { university: 'University of Oxford', subject: 'Law', rank: '4', score: '88.5' },
      { university: 'University of Oxford', subject: 'Law', rank: '8', score: '70' },
    ],
    medSchools: [medRow('University of Oxford')],
    admissions: [
      {
        university: 'Oxford',
        course: 'All',
        totalApplicants: '20,000',
        ukApplicants: null,
        intlApplicants: null,
        totalOffers: null,
        ukOffers: null,
        intlOffers: null,
        totalOfferPct: '16%',
        ukOfferPct: null,
        intlOfferPct: null,
      },
    ],
  };

  const { records, report } = mergeRecords(extracts);
  assert.equal(records.length, 3);
  const [dentistry, law, all] = records;
  assert.ok(dentistry && law && all);

  assert.equal(dentistry.university, 'University of Somewhere');
  assert.equal(dentistry.domain, 'Medicine & Health');
  assert.equal(dentistry.qsGlobalRank, null);
  assert.equal(dentistry.bestGlobalRank, null);
  assert.equal('medical' in dentistry, false);

  assert.equal(law.qsGlobalRank, 2);
  assert.equal(law.qsSubjectRank, 4);
  assert.equal(law.qsSubjectScore, 88.5);
  assert.equal(law.qsGlobalNorm, null);
  assert.equal('medical' in law, false);

  assert.equal(all.course, 'All');
  assert.equal('admissions' in all, false);

  assert.deepEqual(report.unmappedUniversities, ['University of Somewhere']);
  assert.equal(report.medicineCourses, 1);
  assert.equal(report.withMedicalData, 0);
  assert.equal(report.withAdmissions, 0);
});

function courseRow(university: string, course: string): RawCourseRow {
  return {
    university,
    course,
    alevelGrades: null,
    ibPoints: null,
    studyMode: null,
    duration: null,
    courseUrl: null,
    ucasCode: null,
    degreeLevel: null,
    qualification: null,
  };
}

function medRow(university: string): RawMedSchoolRow {
  return {
    university,
    source: 'council',
    course: null,
    alevelReq: null,
    ibReq: null,
    gcseReq: null,
    admissionTest: null,
    interviewType: null,
    teachingStyle: null,
    workExperience: null,
    singaporeApproved: null,
    url: null,
    location: null,
    intlApplicants: null,
    intlOffers: null,
    intlOfferPct: null,
    intlPlaces: null,
  };
}
