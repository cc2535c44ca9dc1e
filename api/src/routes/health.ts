import type { FastifyInstance, FastifyRequest } from 'fastify';

import { API_VERSION } from './sharedSchemas.js';
import { SOURCE_TABLE_NAMES, findSchemaProblems, type SchemaProblem } from '../sources/sqlite_source.js';

type ReadinessChecks = {
  sqlite: {
    status: 'up' | 'down';
    message?: string;
  };
  tables: {
    status: 'up' | 'down';
    missing: string[];
    missingColumns: Array<{ table: string; columns: string[] }>;
  };
  master: {
    loaded: boolean;
    records: number;
  };
};

export async function registerHealthRoutes(app: FastifyInstance) {
  app.get('/health', async (request) => {
    const checks = runReadinessChecks(request);
    const dependencies: Record<string, 'up' | 'down'> = {
      sqlite: checks.sqlite.status,
      schema: checks.tables.status,
    };
    const status: 'ok' | 'degraded' = Object.values(dependencies).every((value) => value === 'up') ? 'ok' : 'degraded';

    return {
      status,
      dependencies,
      version: API_VERSION,
      generatedAt: new Date().toISOString(),
    };
  });

  app.get('/ready', async (request, reply) => {
    const checks = runReadinessChecks(request);
    const status: 'ready' | 'not_ready' = checks.sqlite.status === 'up' && checks.tables.status === 'up' ? 'ready' : 'not_ready';
    const payload = {
      status,
      checks,
      version: API_VERSION,
      generatedAt: new Date().toISOString(),
    };

    if (status !== 'ready') {
      return reply.status(503).send(payload);
    }

    return payload;
  });
}

function runReadinessChecks(request: FastifyRequest): ReadinessChecks {
  const { getDb, masterCache } = request.server.container;
  const cacheStatus = masterCache.status();
  const checks: ReadinessChecks = {
    sqlite: { status: 'up' },
    tables: { status: 'up', missing: [], missingColumns: [] },
    master: { loaded: cacheStatus.loaded, records: cacheStatus.records },
  };

  try {
    const db = getDb();
    db.prepare('select 1').get();
    const problems = findSchemaProblems(db);
    if (problems.length) {
      checks.tables = { status: 'down', ...describeProblems(problems) };
      request.log.error({ problems }, 'source tables missing or incomplete');
    }
  } catch (error) {
    checks.sqlite.status = 'down';
    checks.sqlite.message = error instanceof Error ? error.message : 'Unknown sqlite error';
    request.log.error({ err: error }, 'sqlite readiness probe failed');
    checks.tables = { status: 'down', missing: [...SOURCE_TABLE_NAMES], missingColumns: [] };
  }

  return checks;
}

function describeProblems(problems: SchemaProblem[]) {
  return {
    missing: problems.filter((problem) => problem.tableMissing).map((problem) => problem.table),
    missingColumns: problems
      .filter((problem) => !problem.tableMissing)
      .map((problem) => ({ table: problem.table, columns: problem.missingColumns })),
  };
}
