// =============================================================================
// Attendwell API: Engagement dashboard (any admin)
// GET /engagement/dashboard          live current-week view, filtered + paged
// GET /engagement/dashboard/summary  aggregate counts for the same week
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { DashboardQuerySchema, DashboardSummaryQuerySchema, currentWeekStart } from '@attendwell/shared';
import { principalOf } from '../../plugins/auth.js';
import { scopeOrgId } from '../../services/authorization.js';
import { compareByRisk, loadWeekView, summarise } from '../../services/engagement.js';

export default async function engagementRoutes(fastify: FastifyInstance): Promise<void> {
  const admin = { preHandler: [fastify.requireAnyAdmin] };

  fastify.get('/dashboard', admin, async (request, reply) => {
    const query = DashboardQuerySchema.parse(request.query);
    const organizationId = scopeOrgId(principalOf(request));
    const weekStart = currentWeekStart(new Date());

    const views = await request.scoped((repos) =>
      loadWeekView(repos, {
        weekStart,
        filter: {
          organization_id: organizationId,
          location_id: query.location_id,
          program_id: query.program_id,
          assignment_status: query.assignment_status,
          statuses: ['active'],
        },
      }),
    );

    const matching = views
      .filter((v) => !query.compliance_status || v.compliance_status === query.compliance_status)
      .filter((v) => !query.engagement_category || v.engagement_category === query.engagement_category)
      .filter((v) => !query.risk_category || v.risk_category === query.risk_category.toLowerCase())
      .sort(compareByRisk);

    const items = matching.slice(query.offset, query.offset + query.limit);
    return reply.send({
      success: true,
      data: {
        week_start_date: weekStart,
        items,
        pagination: {
          total: matching.length,
          limit: query.limit,
          offset: query.offset,
          has_more: query.offset + items.length < matching.length,
        },
      },
    });
  });

  fastify.get('/dashboard/summary', admin, async (request, reply) => {
    const query = DashboardSummaryQuerySchema.parse(request.query);
    const organizationId = scopeOrgId(principalOf(request));
    const weekStart = currentWeekStart(new Date());

    const views = await request.scoped((repos) =>
      loadWeekView(repos, {
        weekStart,
        filter: { organization_id: organizationId, location_id: query.location_id, statuses: ['active'] },
      }),
    );
    return reply.send({ success: true, data: summarise(views, weekStart) });
  });
}
