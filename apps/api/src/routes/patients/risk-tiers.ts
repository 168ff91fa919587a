// =============================================================================
// Attendwell API: Risk tier routes (any admin), mounted at /patients/risk-tiers
//
// Ranges may overlap; classification then takes the lowest sort_order. Writes
// that introduce an overlap succeed and are logged as a warning.
// =============================================================================

import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RiskTierCreateSchema, RiskTierUpdateSchema, UuidSchema, type RiskTier } from '@attendwell/shared';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { principalOf } from '../../plugins/auth.js';
import { UniqueViolationError, type Repositories } from '../../repositories/types.js';
import { resolveTargetOrgId, scopeOrgId } from '../../services/authorization.js';
import { overlappingTiers } from '../../services/riskClassifier.js';

const IdParams = z.object({ id: UuidSchema });

const DUPLICATE_LABEL = 'A risk tier with this label already exists in this organization';

async function rethrowDuplicateLabel<T>(work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    if (err instanceof UniqueViolationError) throw new ValidationError(DUPLICATE_LABEL);
    throw err;
  }
}

async function warnOnOverlap(repos: Repositories, tier: RiskTier, log: FastifyBaseLogger): Promise<void> {
  const siblings = await repos.riskTiers.list({ organization_id: tier.organization_id, status: 'active' });
  const overlaps = overlappingTiers(tier, siblings);
  if (overlaps.length > 0) {
    log.warn(
      { tier_id: tier.tier_id, overlapping_tier_ids: overlaps.map((t) => t.tier_id) },
      'Risk tier range overlaps other active tiers',
    );
  }
}

export default async function riskTierRoutes(fastify: FastifyInstance): Promise<void> {
  const admin = { preHandler: [fastify.requireAnyAdmin] };

  fastify.get('/', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const tiers = await request.scoped((repos) =>
      repos.riskTiers.list({ organization_id: organizationId, status: 'active' }),
    );
    return reply.send({ success: true, data: tiers });
  });

  fastify.post('/', admin, async (request, reply) => {
    const body = RiskTierCreateSchema.parse(request.body);
    const organizationId = resolveTargetOrgId(principalOf(request), body.organization_id);

    const tier = await rethrowDuplicateLabel(
      request.scoped(async (repos) => {
        const created = await repos.riskTiers.create({
          organization_id: organizationId,
          tier_label: body.tier_label,
          tier_description: body.tier_description,
          recommended_actions: body.recommended_actions,
          risk_level_range_low: body.risk_level_range_low,
          risk_level_range_high: body.risk_level_range_high,
          color: body.color,
          sort_order: body.sort_order,
          auto_flag_for_followup: body.auto_flag_for_followup,
        });
        await warnOnOverlap(repos, created, request.log);
        return created;
      }),
    );

    request.log.info({ tier_id: tier.tier_id }, 'Risk tier created');
    return reply.status(201).send({ success: true, data: tier });
  });

  fastify.put('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const body = RiskTierUpdateSchema.parse(request.body);

    const tier = await rethrowDuplicateLabel(
      request.scoped(async (repos) => {
        const existing = await repos.riskTiers.findById(id);
        if (!existing) throw new NotFoundError('Risk tier');

        const low = body.risk_level_range_low ?? existing.risk_level_range_low;
        const high = body.risk_level_range_high ?? existing.risk_level_range_high;
        if (low >= high) {
          throw new ValidationError('risk_level_range_low must be less than risk_level_range_high');
        }

        const updated = await repos.riskTiers.update(id, body);
        if (!updated) throw new NotFoundError('Risk tier');
        await warnOnOverlap(repos, updated, request.log);
        return updated;
      }),
    );

    request.log.info({ tier_id: id }, 'Risk tier updated');
    return reply.send({ success: true, data: tier });
  });

  fastify.delete('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const deleted = await request.scoped((repos) => repos.riskTiers.delete(id));
    if (!deleted) throw new NotFoundError('Risk tier');

    request.log.info({ tier_id: id }, 'Risk tier deleted');
    return reply.send({ success: true, data: { message: 'Risk tier deleted successfully' } });
  });
}
