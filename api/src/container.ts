import Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';

import type { AppConfig } from './config.js';
import { SourceUnavailableError } from './errors.js';
import { MasterRecordCache, loadMasterRecordSet } from './services/masterCache.js';

export interface AppContainer {
  config: AppConfig;
  getDb: () => Database.Database;
  masterCache: MasterRecordCache;
  close: () => void;
}

export function buildContainer({ config, logger }: { config: AppConfig; logger?: FastifyBaseLogger }): AppContainer {
  let db: Database.Database | null = null;

  const getDb = () => {
    if (!db) {
      try {
        db = new Database(config.sqliteFile, { readonly: true, fileMustExist: true });
      } catch (error) {
        throw new SourceUnavailableError(config.sqliteFile, { cause: error });
      }
    }
    return db;
  };

  const masterCache = new MasterRecordCache({
    load: () => loadMasterRecordSet(getDb()),
    ttlMs: config.masterCacheTtlMs,
    logger,
  });

  const close = () => {
    masterCache.invalidate();
    if (db) {
      db.close();
      db = null;
    }
  };

  return { config, getDb, masterCache, close };
}

declare module 'fastify' {
  interface FastifyInstance {
    container: AppContainer;
  }
}
