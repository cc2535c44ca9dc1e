/**
 * Parses a provider rank cell: "=5" -> 5, "101-150" -> 125.5, "4" -> 4.
 */
export function parseRank(cell: unknown): number | null {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell !== 'string') {
    return null;
  }
  const cleaned = cell.trim().replace(/[=+]/g, '');
  if (!cleaned) {
    return null;
  }
  if (cleaned.includes('-')) {
    const [low, high] = cleaned.split('-');
    const lowValue = parseIntegerStrict(low);
    const highValue = parseIntegerStrict(high);
    if (lowValue === null || highValue === null) {
      return null;
    }
    return (lowValue + highValue) / 2;
  }
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * Rescales one rank column onto 0-100, 100 being rank 1 and 0 the worst rank observed.
 * A column with no values, a single distinct value or a max rank <= 1 has no spread
 * to rescale, so every entry comes back null.
 */
export function normalizeRanks<K>(entries: Iterable<readonly [K, number | null]>): Map<K, number | null> {
  const list = Array.from(entries);
  const present = list.map(([, rank]) => rank).filter((rank): rank is number => rank !== null);
  const maxRank = present.length ? Math.max(...present) : null;
  const degenerate = maxRank === null || maxRank <= 1 || new Set(present).size <= 1;

  const result = new Map<K, number | null>();
  for (const [key, rank] of list) {
    if (degenerate || rank === null || maxRank === null) {
      result.set(key, null);
      continue;
    }
    result.set(key, 100 * (1 - (rank - 1) / (maxRank - 1)));
  }
  return result;
}

export interface RankColumns {
  qsGlobalRank: number | null;
  theRank: number | null;
  qsSubjectRank: number | null;
}

export interface NormalizedRankColumns {
  qsGlobalNorm: number | null;
  theNorm: number | null;
  qsSubjectNorm: number | null;
}

/**
 * Normalizes every rank column across the full record set; the result is index-aligned with the input.
 */
export function normalizeRankColumns(records: readonly RankColumns[]): NormalizedRankColumns[] {
  const qsGlobal = normalizeRanks(records.map((record, index) => [index, record.qsGlobalRank] as const));
  const the = normalizeRanks(records.map((record, index) => [index, record.theRank] as const));
  const qsSubject = normalizeRanks(records.map((record, index) => [index, record.qsSubjectRank] as const));

  return records.map((_, index) => ({
    qsGlobalNorm: qsGlobal.get(index) ?? null,
    theNorm: the.get(index) ?? null,
    qsSubjectNorm: qsSubject.get(index) ?? null,
  }));
}

function parseIntegerStrict(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}
