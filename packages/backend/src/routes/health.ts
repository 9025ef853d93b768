import { FastifyInstance } from 'fastify';

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /health - Liveness probe
  fastify.get('/health', async () => {
    return { status: 'ok' };
  });
}
