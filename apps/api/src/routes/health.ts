// =============================================================================
// Attendwell API: Health check route
// GET /health  →  200 { status: 'ok', ... } or 503 when the database is down
// =============================================================================

import type { FastifyInstance } from 'fastify';

const VERSION = '0.1.0';

export default async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', { logLevel: 'silent' }, async (_request, reply) => {
    let dbOk = false;
    try {
      await fastify.store.ping();
      dbOk = true;
    } catch (err) {
      fastify.log.warn({ err }, 'Health check: DB unreachable');
    }

    return reply.status(dbOk ? 200 : 503).send({
      status: dbOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      version: VERSION,
      db: dbOk ? 'connected' : 'unreachable',
    });
  });
}
