import { readFileSync } from 'node:fs';

import { z } from 'zod';

export const NAME_SOURCES = ['courses', 'qs', 'the', 'medCouncil', 'medStats', 'admissions'] as const;

export type NameSource = (typeof NAME_SOURCES)[number];

const aliasMapSchema = z.record(z.string(), z.string().min(1));

const aliasFileSchema = z.object({
  canonical: z.array(z.string().min(1)),
  courses: aliasMapSchema,
  qs: aliasMapSchema,
  the: aliasMapSchema,
  medCouncil: aliasMapSchema,
  medStats: aliasMapSchema,
  admissions: aliasMapSchema,
});

const ALIASES_FILE = new URL('./data/university_aliases.json', import.meta.url);

const aliasFile = aliasFileSchema.parse(JSON.parse(readFileSync(ALIASES_FILE, 'utf8')));

const ALIASES: Record<NameSource, ReadonlyMap<string, string>> = {
  courses: new Map(Object.entries(aliasFile.courses)),
  qs: new Map(Object.entries(aliasFile.qs)),
  the: new Map(Object.entries(aliasFile.the)),
  medCouncil: new Map(Object.entries(aliasFile.medCouncil)),
  medStats: new Map(Object.entries(aliasFile.medStats)),
  admissions: new Map(Object.entries(aliasFile.admissions)),
};

const CANONICAL_NAMES = new Set(aliasFile.canonical);

/**
 * Resolves a provider's own spelling to the name every table joins on.
 * Unknown spellings pass through trimmed.
 */
export function canonicalUniversity(raw: string, source: NameSource): string {
  const trimmed = raw.trim();
  return ALIASES[source].get(trimmed) ?? trimmed;
}

export function isKnownCourseUniversity(raw: string): boolean {
  const trimmed = raw.trim();
  return ALIASES.courses.has(trimmed) || CANONICAL_NAMES.has(trimmed);
}

/**
 * Upper-cases every letter that follows a non-letter ("history and politics" -> "History And Politics").
 * Both sides of the admissions join go through this, so it only has to agree with itself.
 */
export function toTitleCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => `${boundary}${letter.toUpperCase()}`);
}
