import type { FastifyInstance } from 'fastify';

import { buildMeta } from './sharedSchemas.js';

export async function registerAdminRoutes(app: FastifyInstance) {
  app.get('/admin/cache', async (request, reply) => {
    reply.header('x-trace-id', String(request.id));
    return {
      meta: buildMeta(),
      data: request.server.container.masterCache.status(),
    };
  });

  app.post('/admin/cache/invalidate', async (request, reply) => {
    const traceId = String(request.id);
    const { masterCache } = request.server.container;
    const previous = masterCache.status();
    masterCache.invalidate();
    request.log.info({ event: 'admin.cache_invalidated', previousLoadedAt: previous.loadedAt, traceId }, 'master cache invalidated');
    reply.header('x-trace-id', traceId);
    return {
      meta: buildMeta(),
      data: {
        invalidated: previous.loaded,
        previousLoadedAt: previous.loadedAt,
      },
    };
  });
}
