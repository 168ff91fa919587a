// =============================================================================
// Attendwell API: Location routes
// GET    /locations              authenticated
// GET    /locations/with-stats   any admin
// GET    /locations/:id          authenticated, with stats
// POST   /locations              any admin
// PUT    /locations/:id          any admin
// PATCH  /locations/:id/timings  any admin, schedule/timezone only
// DELETE /locations/:id          any admin, refused while active patients remain
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  LocationCreateSchema,
  LocationTimingsSchema,
  LocationUpdateSchema,
  UuidSchema,
  currentWeekStart,
  type Location,
  type LocationCreateInput,
  type LocationStats,
  type WeeklySchedule,
} from '@attendwell/shared';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { principalOf } from '../../plugins/auth.js';
import type { Repositories } from '../../repositories/types.js';
import { resolveTargetOrgId, scopeOrgId } from '../../services/authorization.js';
import { remainingClinicHours, weeklyScheduledHours } from '../../services/clinicHours.js';

const IdParams = z.object({ id: UuidSchema });

function scheduleFrom(input: LocationCreateInput): WeeklySchedule {
  return {
    monday_open: input.monday_open ?? null,
    monday_close: input.monday_close ?? null,
    tuesday_open: input.tuesday_open ?? null,
    tuesday_close: input.tuesday_close ?? null,
    wednesday_open: input.wednesday_open ?? null,
    wednesday_close: input.wednesday_close ?? null,
    thursday_open: input.thursday_open ?? null,
    thursday_close: input.thursday_close ?? null,
    friday_open: input.friday_open ?? null,
    friday_close: input.friday_close ?? null,
    saturday_open: input.saturday_open ?? null,
    saturday_close: input.saturday_close ?? null,
    sunday_open: input.sunday_open ?? null,
    sunday_close: input.sunday_close ?? null,
  };
}

async function statsFor(repos: Repositories, location: Location, weekStart: string): Promise<LocationStats> {
  const [patients, hoursUsed] = await Promise.all([
    repos.patients.list({ location_id: location.location_id, statuses: ['active'] }),
    repos.attendance.locationHoursUsed(weekStart, [location.location_id]),
  ]);
  const assigned = patients.filter((p) => p.assignment_status === 'assigned').length;
  return {
    total_patients: patients.length,
    assigned_patients: assigned,
    pending_patients: patients.length - assigned,
    weekly_hours_total: weeklyScheduledHours(location),
    remaining_hours_this_week: remainingClinicHours(location, hoursUsed.get(location.location_id) ?? 0),
  };
}

export default async function locationRoutes(fastify: FastifyInstance): Promise<void> {
  const authenticated = { preHandler: [fastify.requireAuthenticated] };
  const admin = { preHandler: [fastify.requireAnyAdmin] };

  fastify.get('/', authenticated, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const locations = await request.scoped((repos) => repos.locations.list({ organization_id: organizationId }));
    return reply.send({ success: true, data: locations });
  });

  fastify.get('/with-stats', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const weekStart = currentWeekStart(new Date());
    const items = await request.scoped(async (repos) => {
      const locations = await repos.locations.list({ organization_id: organizationId });
      const out: Array<Location & { stats: LocationStats }> = [];
      for (const location of locations) {
        out.push({ ...location, stats: await statsFor(repos, location, weekStart) });
      }
      return out;
    });
    return reply.send({ success: true, data: items });
  });

  fastify.get('/:id', authenticated, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const item = await request.scoped(async (repos) => {
      const location = await repos.locations.findById(id);
      if (!location) throw new NotFoundError('Location');
      return { ...location, stats: await statsFor(repos, location, currentWeekStart(new Date())) };
    });
    return reply.send({ success: true, data: item });
  });

  fastify.post('/', admin, async (request, reply) => {
    const body = LocationCreateSchema.parse(request.body);
    const organizationId = resolveTargetOrgId(principalOf(request), body.organization_id);

    const location = await request.scoped((repos) =>
      repos.locations.create({
        organization_id: organizationId,
        name: body.name,
        timezone: body.timezone,
        ...scheduleFrom(body),
      }),
    );

    request.log.info({ location_id: location.location_id }, 'Location created');
    return reply.status(201).send({ success: true, data: location });
  });

  fastify.put('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const body = LocationUpdateSchema.parse(request.body);

    const location = await request.scoped((repos) => repos.locations.update(id, body));
    if (!location) throw new NotFoundError('Location');

    request.log.info({ location_id: id }, 'Location updated');
    return reply.send({ success: true, data: location });
  });

  fastify.patch('/:id/timings', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const body = LocationTimingsSchema.parse(request.body);

    const location = await request.scoped((repos) => repos.locations.update(id, body));
    if (!location) throw new NotFoundError('Location');

    request.log.info({ location_id: id }, 'Location timings updated');
    return reply.send({ success: true, data: location });
  });

  fastify.delete('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);

    await request.scoped(async (repos) => {
      const location = await repos.locations.findById(id);
      if (!location) throw new NotFoundError('Location');
      const active = await repos.patients.countActiveAtLocation(id);
      if (active > 0) {
        throw new ValidationError(
          `Cannot delete location: ${active} active patient(s) are still assigned to it`,
          { patient_count: active },
        );
      }
      await repos.locations.delete(id);
    });

    request.log.info({ location_id: id }, 'Location deleted');
    return reply.send({ success: true, data: { message: 'Location deleted successfully' } });
  });
}
