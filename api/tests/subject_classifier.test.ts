import test from 'node:test';
import assert from 'node:assert/strict';

import {
  DOMAINS,
  FALLBACK_DOMAIN,
  SUBJECT_RULES,
  SUBJECT_TO_DOMAIN,
  classifySubjects,
  domainOf,
  domainOfSubject,
  primarySubject,
} from '../src/pipeline/subject_classifier.js';

test('lists every matching subject in rule order', () => {
  assert.deepEqual(classifySubjects('Chemical Engineering'), [
    'Engineering - Chemical',
    'Chemistry',
    'Engineering & Technology',
  ]);
  assert.deepEqual(classifySubjects('Biochemistry'), ['Chemistry', 'Biological']);
  assert.deepEqual(classifySubjects('Philosophy, Politics And Economics'), [
    'Economics & Econometrics',
    'Politics',
    'Philosophy',
  ]);
});

test('matches keywords case-insensitively', () => {
  assert.deepEqual(classifySubjects('LAW'), ['Law']);
  assert.equal(primarySubject('history'), 'History$');
});

test('returns no subject for unrecognised or empty titles', () => {
  assert.deepEqual(classifySubjects('Basket Weaving'), []);
  assert.deepEqual(classifySubjects(''), []);
  assert.equal(primarySubject(null), null);
});

test('places specific subjects ahead of their catch-alls', () => {
  assert.equal(primarySubject('Computer Science'), 'Computer Science');
  assert.equal(primarySubject('Art History'), 'History$');
  assert.equal(primarySubject('Civil Engineering'), 'Engineering - Civil');
  assert.equal(primarySubject('Chemical Engineering BEng'), 'Engineering - Chemical');
});

test('maps the primary subject onto a domain', () => {
  assert.equal(domainOf('Medicine'), 'Medicine & Health');
  assert.equal(domainOf('Nursing'), 'Medicine & Health');
  assert.equal(domainOf('History And Politics'), 'Social Sciences');
  assert.equal(domainOf('Mathematics'), 'Mathematics & Statistics');
  assert.equal(domainOf('Basket Weaving'), FALLBACK_DOMAIN);
  assert.equal(domainOfSubject('Not A Subject'), 'Other');
  assert.equal(domainOfSubject(null), 'Other');
});

test('every rule subject has a domain from the closed list', () => {
  for (const rule of SUBJECT_RULES) {
    const domain = SUBJECT_TO_DOMAIN.get(rule.subject);
    assert.ok(domain, `no domain for ${rule.subject}`);
    assert.ok(DOMAINS.includes(domain));
  }
});
