import type { FastifyInstance } from 'fastify';

import { buildMeta } from './sharedSchemas.js';
import { getFilterOptions } from '../queries/filters.js';

export async function registerFilterRoutes(app: FastifyInstance) {
  app.get('/filters', async (request) => {
    const { records, medSchools } = request.server.container.masterCache.get();
    return {
      meta: buildMeta(),
      data: getFilterOptions(records, medSchools),
    };
  });
}
