// =============================================================================
// Attendwell API: Audit trail retrieval (system admin only)
// GET  /audit/logs
// GET  /audit/logs/phi
// GET  /audit/logs/failed-access
// GET  /audit/stats/summary
// POST /audit/cleanup
// =============================================================================

import type { FastifyInstance } from 'fastify';
import {
  AuditCleanupQuerySchema,
  AuditLogQuerySchema,
  HoursWindowQuerySchema,
  PhiAccessQuerySchema,
} from '@attendwell/shared';

const HOUR_MS = 60 * 60 * 1000;

function hoursAgo(hours: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - hours * HOUR_MS);
}

/** Calendar months back from `now`, in UTC. */
export function retentionCutoff(months: number, now: Date = new Date()): Date {
  const cutoff = new Date(now.getTime());
  cutoff.setUTCMonth(cutoff.getUTCMonth() - months);
  return cutoff;
}

export default async function auditRoutes(fastify: FastifyInstance): Promise<void> {
  const superuser = { preHandler: [fastify.requireSuperuser] };
  const { store } = fastify;

  fastify.get('/logs', superuser, async (request, reply) => {
    const query = AuditLogQuerySchema.parse(request.query);
    const page = await store.withSystem((repos) => repos.audit.list(query));
    return reply.send({
      success: true,
      data: {
        items: page.items,
        pagination: {
          total: page.total,
          limit: query.limit,
          offset: query.offset,
          has_more: query.offset + page.items.length < page.total,
        },
      },
    });
  });

  fastify.get('/logs/phi', superuser, async (request, reply) => {
    const query = PhiAccessQuerySchema.parse(request.query);
    const items = await store.withSystem((repos) => repos.audit.listPhiAccess(query));
    return reply.send({ success: true, data: items });
  });

  fastify.get('/logs/failed-access', superuser, async (request, reply) => {
    const { hours } = HoursWindowQuerySchema.parse(request.query);
    const items = await store.withSystem((repos) => repos.audit.listFailedAccess(hoursAgo(hours)));
    return reply.send({ success: true, data: { window_hours: hours, items } });
  });

  fastify.get('/stats/summary', superuser, async (request, reply) => {
    const { hours } = HoursWindowQuerySchema.parse(request.query);
    const summary = await store.withSystem((repos) => repos.audit.summary(hoursAgo(hours), hours));
    return reply.send({ success: true, data: summary });
  });

  fastify.post('/cleanup', superuser, async (request, reply) => {
    const query = AuditCleanupQuerySchema.parse(request.query);
    const retentionMonths = query.retention_months ?? fastify.appConfig.auditRetentionMonths;
    const cutoff = retentionCutoff(retentionMonths);

    const deletedCount = await store.withSystem((repos) => repos.audit.deleteOlderThan(cutoff));
    request.log.info({ deleted_count: deletedCount, retention_months: retentionMonths }, 'Audit logs cleaned up');
    return reply.send({
      success: true,
      data: { deleted_count: deletedCount, retention_months: retentionMonths, cutoff_date: cutoff.toISOString() },
    });
  });
}
