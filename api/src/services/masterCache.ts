import { performance } from 'node:perf_hooks';
import type Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';

import { mergeRecords } from '../pipeline/record_merger.js';
import type { MasterRecordSet } from '../pipeline/types.js';
import { readRawExtracts } from '../sources/sqlite_source.js';

export interface MasterCacheOptions {
  load: () => MasterRecordSet;
  /** 0 keeps the loaded set until invalidate() is called. */
  ttlMs: number;
  now?: () => number;
  logger?: FastifyBaseLogger;
}

export interface MasterCacheStatus {
  loaded: boolean;
  loadedAt: string | null;
  expiresAt: string | null;
  records: number;
}

/**
 * Holds the merged master record set. The set is read-only once built; a
 * failed load leaves the cache empty so the next call retries.
 */
export class MasterRecordCache {
  #entry: { value: MasterRecordSet; loadedAtMs: number } | null = null;
  readonly #load: () => MasterRecordSet;
  readonly #ttlMs: number;
  readonly #now: () => number;
  readonly #logger?: FastifyBaseLogger;

  constructor(options: MasterCacheOptions) {
    this.#load = options.load;
    this.#ttlMs = options.ttlMs;
    this.#now = options.now ?? Date.now;
    this.#logger = options.logger;
  }

  get(): MasterRecordSet {
    const now = this.#now();
    if (this.#entry && !this.#isExpired(this.#entry.loadedAtMs, now)) {
      return this.#entry.value;
    }

    this.#entry = null;
    const startedAt = performance.now();
    const value = this.#load();
    this.#entry = { value, loadedAtMs: now };

    const { report } = value;
    this.#logger?.info(
      {
        event: 'master.loaded',
        durationMs: Math.round(performance.now() - startedAt),
        ...report,
      },
      'master record set loaded',
    );
    if (report.unmappedUniversities.length) {
      this.#logger?.warn(
        { event: 'master.unmapped_universities', universities: report.unmappedUniversities },
        'course source contains universities without a canonical name',
      );
    }
    return value;
  }

  invalidate() {
    if (this.#entry) {
      this.#logger?.info({ event: 'master.invalidated' }, 'master record set invalidated');
    }
    this.#entry = null;
  }

  status(): MasterCacheStatus {
    if (!this.#entry) {
      return { loaded: false, loadedAt: null, expiresAt: null, records: 0 };
    }
    const { loadedAtMs, value } = this.#entry;
    return {
      loaded: true,
      loadedAt: new Date(loadedAtMs).toISOString(),
      expiresAt: this.#ttlMs > 0 ? new Date(loadedAtMs + this.#ttlMs).toISOString() : null,
      records: value.records.length,
    };
  }

  #isExpired(loadedAtMs: number, now: number) {
    return this.#ttlMs > 0 && now - loadedAtMs >= this.#ttlMs;
  }
}

export function loadMasterRecordSet(db: Database.Database, now: () => number = Date.now): MasterRecordSet {
  const { records, medSchools, report } = mergeRecords(readRawExtracts(db));
  return { records, medSchools, report, loadedAt: new Date(now()) };
}
