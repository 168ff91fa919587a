// =============================================================================
// Attendwell API: Patient routes (any admin)
// POST   /patients                          create
// GET    /patients/unassigned | /assigned   listings by assignment
// GET    /patients/all                      every visible patient
// POST   /patients/assign | /assign-bulk    program + location assignment
// GET    /patients/risk/current-week        live classification
// GET    /patients/risk/week/:weekStartDate stored weekly metrics
// GET    /patients/risk/:patientId/current  one patient, live
// GET    /patients/export/high-risk         follow-up list
// POST   /patients/calculate-weekly-metrics run the weekly job now
// GET    /patients/:id | PUT | DELETE       single patient
//
// Programs and risk tiers are registered under /patients/programs and
// /patients/risk-tiers.
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  BulkPatientAssignmentSchema,
  CurrentWeekRiskQuerySchema,
  IsoDateSchema,
  PatientAssignmentSchema,
  PatientCreateSchema,
  PatientListQuerySchema,
  PatientUpdateSchema,
  UuidSchema,
  WeeklyCalculationSchema,
  currentWeekStart,
  deriveAssignmentStatus,
  weekStartOf,
  type Patient,
} from '@attendwell/shared';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { principalOf } from '../../plugins/auth.js';
import { UniqueViolationError } from '../../repositories/types.js';
import { resolveTargetOrgId, scopeOrgId, tenantContextFor } from '../../services/authorization.js';
import {
  compareByRisk,
  isHighRisk,
  loadPatientWeekView,
  loadWeekView,
} from '../../services/engagement.js';
import { assertReferencesInOrganization, assignPatient } from '../../services/patientAssignment.js';
import { calculateWeeklyMetrics } from '../../services/weeklyMetrics.js';
import programRoutes from './programs.js';
import riskTierRoutes from './risk-tiers.js';

const IdParams = z.object({ id: UuidSchema });

const DUPLICATE_MR = 'Medical record number already exists in this organization';

async function rethrowDuplicateMr<T>(work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    if (err instanceof UniqueViolationError) throw new ValidationError(DUPLICATE_MR);
    throw err;
  }
}

export default async function patientRoutes(fastify: FastifyInstance): Promise<void> {
  const admin = { preHandler: [fastify.requireAnyAdmin] };

  await fastify.register(programRoutes, { prefix: '/programs' });
  await fastify.register(riskTierRoutes, { prefix: '/risk-tiers' });

  // ---------------------------------------------------------------------------
  // POST /patients
  // ---------------------------------------------------------------------------
  fastify.post('/', admin, async (request, reply) => {
    const caller = principalOf(request);
    const body = PatientCreateSchema.parse(request.body);
    const organizationId = resolveTargetOrgId(caller, body.organization_id);

    const org = await fastify.store.withSystem((repos) => repos.organizations.findById(organizationId));
    if (!org || org.status !== 'active') {
      throw new ValidationError('Organization not found or inactive');
    }

    const programId = body.program_id ?? null;
    const locationId = body.location_id ?? null;

    const patient = await rethrowDuplicateMr(
      request.scoped(async (repos) => {
        await assertReferencesInOrganization(repos, organizationId, { program_id: programId, location_id: locationId });
        return repos.patients.create({
          organization_id: organizationId,
          mr: body.mr,
          full_name: body.full_name,
          phone: body.phone ?? null,
          email: body.email ?? null,
          primary_therapist: body.primary_therapist ?? null,
          admission_date: body.admission_date ?? null,
          discharge_date: body.discharge_date ?? null,
          program_id: programId,
          location_id: locationId,
          assignment_status: deriveAssignmentStatus(programId, locationId),
          status: body.status,
        });
      }),
    );

    request.log.info({ patient_id: patient.patient_id }, 'Patient created');
    return reply.status(201).send({ success: true, data: patient });
  });

  // ---------------------------------------------------------------------------
  // Listings
  // ---------------------------------------------------------------------------
  fastify.get('/unassigned', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const patients = await request.scoped((repos) =>
      repos.patients.list({ organization_id: organizationId, assignment_status: 'pending' }),
    );
    return reply.send({ success: true, data: patients });
  });

  fastify.get('/assigned', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const patients = await request.scoped((repos) =>
      repos.patients.list({ organization_id: organizationId, assignment_status: 'assigned' }),
    );
    return reply.send({ success: true, data: patients });
  });

  fastify.get('/all', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const query = PatientListQuerySchema.parse(request.query);
    const patients = await request.scoped((repos) =>
      repos.patients.list({ organization_id: organizationId, assignment_status: query.assignment_status }),
    );
    return reply.send({ success: true, data: patients });
  });

  // ---------------------------------------------------------------------------
  // Assignment
  // ---------------------------------------------------------------------------
  fastify.post('/assign', admin, async (request, reply) => {
    const body = PatientAssignmentSchema.parse(request.body);
    const patient = await request.scoped((repos) => assignPatient(repos, body));
    request.log.info({ patient_id: patient.patient_id }, 'Patient assigned');
    return reply.send({ success: true, data: patient });
  });

  fastify.post('/assign-bulk', admin, async (request, reply) => {
    const { assignments } = BulkPatientAssignmentSchema.parse(request.body);
    const successful: Patient[] = [];
    const failed: Array<{ patient_id: string; error: string }> = [];

    // One transaction per item: a rejected assignment leaves the others in place
    for (const assignment of assignments) {
      try {
        successful.push(await request.scoped((repos) => assignPatient(repos, assignment)));
      } catch (err) {
        if (!(err instanceof NotFoundError) && !(err instanceof ValidationError)) throw err;
        failed.push({ patient_id: assignment.patient_id, error: err.message });
      }
    }

    request.log.info(
      { successful_count: successful.length, failed_count: failed.length },
      'Bulk assignment processed',
    );
    return reply.send({
      success: true,
      data: {
        successful_count: successful.length,
        failed_count: failed.length,
        successful_assignments: successful,
        failed_assignments: failed,
      },
    });
  });

  // ---------------------------------------------------------------------------
  // Risk views
  // ---------------------------------------------------------------------------
  fastify.get('/risk/current-week', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const query = CurrentWeekRiskQuerySchema.parse(request.query);
    const weekStart = currentWeekStart(new Date());

    const views = await request.scoped((repos) =>
      loadWeekView(repos, { weekStart, filter: { organization_id: organizationId, statuses: ['active'] } }),
    );
    const items = views
      .filter((v) => !query.compliance_status || v.compliance_status === query.compliance_status)
      .sort(compareByRisk);

    return reply.send({ success: true, data: { week_start_date: weekStart, items } });
  });

  fastify.get('/risk/week/:weekStartDate', admin, async (request, reply) => {
    const { weekStartDate } = z.object({ weekStartDate: IsoDateSchema }).parse(request.params);
    const organizationId = scopeOrgId(principalOf(request));
    const weekStart = weekStartOf(weekStartDate);

    const metrics = await request.scoped((repos) => repos.weeklyMetrics.listForWeek(weekStart, organizationId));
    return reply.send({ success: true, data: { week_start_date: weekStart, items: metrics } });
  });

  fastify.get('/risk/:patientId/current', admin, async (request, reply) => {
    const { patientId } = z.object({ patientId: UuidSchema }).parse(request.params);
    const weekStart = currentWeekStart(new Date());

    const view = await request.scoped(async (repos) => {
      const patient = await repos.patients.findById(patientId);
      if (!patient) throw new NotFoundError('Patient');
      return loadPatientWeekView(repos, patient, weekStart);
    });
    return reply.send({ success: true, data: view });
  });

  // ---------------------------------------------------------------------------
  // GET /export/high-risk
  // ---------------------------------------------------------------------------
  fastify.get('/export/high-risk', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const exportedAt = new Date();
    const weekStart = currentWeekStart(exportedAt);

    const views = await request.scoped((repos) =>
      loadWeekView(repos, { weekStart, filter: { organization_id: organizationId, statuses: ['active'] } }),
    );
    const patients = views.filter(isHighRisk).sort(compareByRisk);

    request.log.info({ count: patients.length }, 'High-risk list exported');
    return reply.send({
      success: true,
      data: {
        week_start_date: weekStart,
        exported_at: exportedAt.toISOString(),
        total_count: patients.length,
        patients,
      },
    });
  });

  // ---------------------------------------------------------------------------
  // POST /calculate-weekly-metrics
  // ---------------------------------------------------------------------------
  fastify.post('/calculate-weekly-metrics', admin, async (request, reply) => {
    const caller = principalOf(request);
    const body = WeeklyCalculationSchema.parse(request.body ?? {});
    const organizationId = resolveTargetOrgId(caller, body.organization_id);
    const weekStart = body.week_start_date ?? currentWeekStart();

    const result = await calculateWeeklyMetrics(
      { store: fastify.store, log: request.log },
      tenantContextFor(caller),
      organizationId,
      weekStart,
      'manual',
    );
    return reply.send({ success: true, data: result });
  });

  // ---------------------------------------------------------------------------
  // Single patient
  // ---------------------------------------------------------------------------
  fastify.get('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const patient = await request.scoped((repos) => repos.patients.findById(id));
    if (!patient) throw new NotFoundError('Patient');
    return reply.send({ success: true, data: patient });
  });

  fastify.put('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const body = PatientUpdateSchema.parse(request.body);

    const patient = await rethrowDuplicateMr(
      request.scoped(async (repos) => {
        const existing = await repos.patients.findById(id);
        if (!existing) throw new NotFoundError('Patient');

        const programId = body.program_id !== undefined ? body.program_id : existing.program_id;
        const locationId = body.location_id !== undefined ? body.location_id : existing.location_id;
        await assertReferencesInOrganization(repos, existing.organization_id, {
          program_id: body.program_id,
          location_id: body.location_id,
        });

        const updated = await repos.patients.update(id, {
          ...body,
          assignment_status: deriveAssignmentStatus(programId, locationId),
        });
        if (!updated) throw new NotFoundError('Patient');
        return updated;
      }),
    );

    request.log.info({ patient_id: patient.patient_id }, 'Patient updated');
    return reply.send({ success: true, data: patient });
  });

  fastify.delete('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const deleted = await request.scoped((repos) => repos.patients.softDelete(id));
    if (!deleted) throw new NotFoundError('Patient');
    request.log.info({ patient_id: id }, 'Patient deleted');
    return reply.send({ success: true, data: { message: 'Patient deleted successfully' } });
  });
}
