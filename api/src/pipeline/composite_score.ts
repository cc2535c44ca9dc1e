import type { NormalizedRankColumns } from './rank_normalizer.js';

export type Scored<T> = T & { weightedScore: number | null };

/**
 * Blends the global component (mean of the QS and THE normalized ranks that
 * exist) with the subject component. When only one component exists it is
 * used as-is, whatever the weight.
 *
 * @param globalWeight 0 = subject rank only, 1 = global rank only
 */
export function computeWeightedScore(record: NormalizedRankColumns, globalWeight: number): number | null {
  assertWeight(globalWeight);
  const globalParts = [record.qsGlobalNorm, record.theNorm].filter((value): value is number => value !== null);
  const globalComponent = globalParts.length
    ? globalParts.reduce((sum, value) => sum + value, 0) / globalParts.length
    : null;
  const subjectComponent = record.qsSubjectNorm;

  if (globalComponent !== null && subjectComponent !== null) {
    return globalWeight * globalComponent + (1 - globalWeight) * subjectComponent;
  }
  return globalComponent ?? subjectComponent;
}

export function scoreRecords<T extends NormalizedRankColumns>(records: readonly T[], globalWeight: number): Array<Scored<T>> {
  assertWeight(globalWeight);
  return records.map((record) => ({ ...record, weightedScore: computeWeightedScore(record, globalWeight) }));
}

function assertWeight(globalWeight: number) {
  if (!(globalWeight >= 0 && globalWeight <= 1)) {
    throw new RangeError(`globalWeight must be within [0, 1], received ${globalWeight}`);
  }
}
