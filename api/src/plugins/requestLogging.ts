import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';

const startTimeSymbol = Symbol('requestStartNs');

type TimedRequest = { [startTimeSymbol]?: bigint };

export const requestLoggingPlugin: FastifyPluginAsync = fp(async (app) => {
  app.addHook('onRequest', async (request) => {
    (request as typeof request & TimedRequest)[startTimeSymbol] = process.hrtime.bigint();
    request.log.debug({ reqId: request.id, method: request.method, url: request.url }, 'request received');
  });

  app.addHook('onResponse', async (request, reply) => {
    const startedAt = (request as typeof request & TimedRequest)[startTimeSymbol];
    const durationMs = startedAt === undefined ? undefined : Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    request.log.info(
      {
        reqId: request.id,
        method: request.method,
        route: request.routeOptions.url,
        statusCode: reply.statusCode,
        durationMs,
      },
      'request completed',
    );
  });
});
