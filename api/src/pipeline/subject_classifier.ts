import { readFileSync } from 'node:fs';

import { z } from 'zod';

export const DOMAINS = [
  'Computing & Technology',
  'Engineering',
  'Mathematics & Statistics',
  'Physical Sciences',
  'Life Sciences',
  'Medicine & Health',
  'Business & Economics',
  'Social Sciences',
  'Law',
  'Humanities',
  'Arts',
  'Other',
] as const;

export type Domain = (typeof DOMAINS)[number];

export const MEDICINE_DOMAIN: Domain = 'Medicine & Health';
export const FALLBACK_DOMAIN: Domain = 'Other';

export interface SubjectRule {
  subject: string;
  keywords: string[];
}

const subjectRulesFileSchema = z.object({
  rules: z
    .array(
      z.object({
        subject: z.string().min(1),
        keywords: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
  domains: z.record(z.string(), z.enum(DOMAINS)),
});

const RULES_FILE = new URL('./data/subject_rules.json', import.meta.url);

const { rules, domains } = subjectRulesFileSchema.parse(JSON.parse(readFileSync(RULES_FILE, 'utf8')));

// Order encodes priority: specific subjects sit above the catch-alls.
export const SUBJECT_RULES: ReadonlyArray<Readonly<SubjectRule>> = rules.map((rule) => ({
  subject: rule.subject,
  keywords: rule.keywords.map((keyword) => keyword.toLowerCase()),
}));

export const SUBJECT_TO_DOMAIN: ReadonlyMap<string, Domain> = new Map(Object.entries(domains));

export function classifySubjects(courseTitle: string | null | undefined): string[] {
  if (!courseTitle) {
    return [];
  }
  const title = courseTitle.toLowerCase();
  const matches: string[] = [];
  for (const rule of SUBJECT_RULES) {
    if (rule.keywords.some((keyword) => title.includes(keyword))) {
      matches.push(rule.subject);
    }
  }
  return matches;
}

export function primarySubject(courseTitle: string | null | undefined): string | null {
  const [first] = classifySubjects(courseTitle);
  return first ?? null;
}

export function domainOfSubject(subject: string | null): Domain {
  if (!subject) {
    return FALLBACK_DOMAIN;
  }
  return SUBJECT_TO_DOMAIN.get(subject) ?? FALLBACK_DOMAIN;
}

export function domainOf(courseTitle: string | null | undefined): Domain {
  return domainOfSubject(primarySubject(courseTitle));
}
