import type { FastifyInstance } from 'fastify';

import { buildMeta } from './sharedSchemas.js';
import { summarizeOverview } from '../queries/overview.js';

export async function registerOverviewRoutes(app: FastifyInstance) {
  app.get('/overview', async (request) => {
    const master = request.server.container.masterCache.get();
    return {
      meta: {
        ...buildMeta(),
        loadedAt: master.loadedAt.toISOString(),
        medicalSchools: master.medSchools.length,
      },
      data: summarizeOverview(master.records),
    };
  });
}
