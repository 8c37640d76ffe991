import type { FastifyInstance } from 'fastify';

export async function registerHealthRoutes(app: FastifyInstance, ping: () => Promise<void>): Promise<void> {
  app.get('/healthz', async (request, reply) => {
    try {
      await ping();
    } catch (err) {
      request.log.warn({ err }, 'health check failed');
      return reply.status(503).send({ status: 'unavailable' });
    }
    return reply.status(200).send({ status: 'ok' });
  });
}
