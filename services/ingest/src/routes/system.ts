import type { FastifyInstance } from 'fastify';

export type SystemRouteOptions = {
  checkReadiness: () => Promise<void>;
};

export async function registerSystemRoutes(app: FastifyInstance, options: SystemRouteOptions): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    try {
      await options.checkReadiness();
    } catch (err) {
      request.log.warn({ err }, 'readiness check failed');
      reply.status(503);
      return { status: 'unavailable', reason: err instanceof Error ? err.message : 'unknown error' };
    }
    return { status: 'ok' };
  });
}
