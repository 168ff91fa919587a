import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Patient } from '@attendwell/shared';
import { bearer, buildTestApp, seedTenants } from '../support/app.js';
import type { MemoryStore } from '../support/memory-store.js';

const MISSING = '99999999-9999-4999-8999-999999999999';

describe('patient administration', () => {
  let app: FastifyInstance;
  let store: MemoryStore;
  let world: ReturnType<typeof seedTenants>;
  let refs: {
    programA: string;
    locationA: string;
    programB: string;
    locationB: string;
  };

  beforeEach(async () => {
    ({ app, store } = await buildTestApp());
    world = seedTenants(store);
    refs = {
      programA: store.addProgram({ organization_id: world.orgA.organization_id, name: 'PHP', hours_per_week: 12 }).program_id,
      locationA: store.addLocation({ organization_id: world.orgA.organization_id, name: 'North' }).location_id,
      programB: store.addProgram({ organization_id: world.orgB.organization_id, name: 'IOP' }).program_id,
      locationB: store.addLocation({ organization_id: world.orgB.organization_id, name: 'South' }).location_id,
    };
  });

  afterEach(async () => {
    await app.close();
  });

  const asAdminA = () => bearer(app, world.adminA);

  async function createPatient(payload: Record<string, unknown>) {
    return app.inject({ method: 'POST', url: '/patients', headers: asAdminA(), payload });
  }

  describe('create', () => {
    it('derives pending without both references and assigned with them', async () => {
      const partial = await createPatient({ mr: 'A-1', full_name: 'Ada', program_id: refs.programA });
      const full = await createPatient({ mr: 'A-2', full_name: 'Ben', program_id: refs.programA, location_id: refs.locationA });

      expect(partial.statusCode).toBe(201);
      expect(partial.json<{ data: Patient }>().data.assignment_status).toBe('pending');
      expect(full.json<{ data: Patient }>().data.assignment_status).toBe('assigned');
    });

    it('rejects a duplicate medical record number within the tenant', async () => {
      await createPatient({ mr: 'A-1', full_name: 'Ada' });
      const dup = await createPatient({ mr: 'A-1', full_name: 'Someone Else' });

      expect(dup.statusCode).toBe(400);
      expect(dup.json()).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Medical record number already exists in this organization' },
      });
    });

    it('allows the same medical record number in another tenant', async () => {
      await createPatient({ mr: 'SHARED', full_name: 'Ada' });
      const other = await app.inject({
        method: 'POST',
        url: '/patients',
        headers: bearer(app, world.adminB),
        payload: { mr: 'SHARED', full_name: 'Ada Too' },
      });
      expect(other.statusCode).toBe(201);
    });

    it('requires a system admin to name the organization', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/patients',
        headers: bearer(app, world.superuser),
        payload: { mr: 'S-1', full_name: 'Sam' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json<{ error: { message: string } }>().error.message).toBe(
        'organization_id is required for system administrators',
      );
    });

    it('rejects a program from another tenant', async () => {
      const res = await createPatient({ mr: 'A-9', full_name: 'Ada', program_id: refs.programB });
      expect(res.statusCode).toBe(400);
      expect(store.tables.patients).toHaveLength(0);
    });
  });

  describe('update', () => {
    it('recomputes the assignment status when a reference is cleared', async () => {
      const created = await createPatient({ mr: 'A-1', full_name: 'Ada', program_id: refs.programA, location_id: refs.locationA });
      const id = created.json<{ data: Patient }>().data.patient_id;

      const res = await app.inject({ method: 'PUT', url: `/patients/${id}`, headers: asAdminA(), payload: { location_id: null } });

      expect(res.statusCode).toBe(200);
      expect(res.json<{ data: Patient }>().data).toMatchObject({
        program_id: refs.programA,
        location_id: null,
        assignment_status: 'pending',
      });
    });

    it('rejects an empty patch', async () => {
      const created = await createPatient({ mr: 'A-1', full_name: 'Ada' });
      const id = created.json<{ data: Patient }>().data.patient_id;
      const res = await app.inject({ method: 'PUT', url: `/patients/${id}`, headers: asAdminA(), payload: {} });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('assignment', () => {
    let patientId: string;

    beforeEach(() => {
      patientId = store.addPatient({ organization_id: world.orgA.organization_id, mr: 'A-1' }).patient_id;
    });

    it('assigns within the tenant', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/patients/assign',
        headers: asAdminA(),
        payload: { patient_id: patientId, program_id: refs.programA, location_id: refs.locationA },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json<{ data: Patient }>().data.assignment_status).toBe('assigned');
    });

    it.each(['adminA', 'superuser'] as const)('rejects a cross-tenant program for %s', async (who) => {
      const res = await app.inject({
        method: 'POST',
        url: '/patients/assign',
        headers: bearer(app, world[who]),
        payload: { patient_id: patientId, program_id: refs.programB, location_id: refs.locationA },
      });
      expect(res.statusCode).toBe(400);
      expect(store.tables.patients[0]?.assignment_status).toBe('pending');
    });

    it('applies bulk assignments one by one and reports the failures', async () => {
      const second = store.addPatient({ organization_id: world.orgA.organization_id, mr: 'A-2' }).patient_id;

      const res = await app.inject({
        method: 'POST',
        url: '/patients/assign-bulk',
        headers: asAdminA(),
        payload: {
          assignments: [
            { patient_id: patientId, program_id: refs.programA, location_id: refs.locationA },
            { patient_id: MISSING, program_id: refs.programA, location_id: refs.locationA },
            { patient_id: second, program_id: refs.programA, location_id: refs.locationB },
          ],
        },
      });

      expect(res.statusCode).toBe(200);
      const data = res.json<{
        data: {
          successful_count: number;
          failed_count: number;
          successful_assignments: Patient[];
          failed_assignments: Array<{ patient_id: string; error: string }>;
        };
      }>().data;
      expect(data.successful_count).toBe(1);
      expect(data.successful_assignments[0]?.patient_id).toBe(patientId);
      expect(data.failed_assignments).toEqual([
        { patient_id: MISSING, error: 'Patient not found' },
        { patient_id: second, error: "Location not found in the patient's organization" },
      ]);
    });
  });

  describe('delete', () => {
    it('soft-deletes and then hides the patient', async () => {
      const id = store.addPatient({ organization_id: world.orgA.organization_id, mr: 'A-1' }).patient_id;

      const del = await app.inject({ method: 'DELETE', url: `/patients/${id}`, headers: asAdminA() });
      const again = await app.inject({ method: 'GET', url: `/patients/${id}`, headers: asAdminA() });

      expect(del.statusCode).toBe(200);
      expect(store.tables.patients[0]?.status).toBe('deleted');
      expect(again.statusCode).toBe(404);
    });
  });

  describe('weekly metrics', () => {
    it('calculates the requested week for the caller organization', async () => {
      store.addPatient({
        organization_id: world.orgA.organization_id,
        mr: 'A-1',
        program_id: refs.programA,
        location_id: refs.locationA,
        assignment_status: 'assigned',
      });
      store.addPatient({ organization_id: world.orgA.organization_id, mr: 'A-2' });
      store.addPatient({
        organization_id: world.orgB.organization_id,
        mr: 'B-1',
        program_id: refs.programB,
        location_id: refs.locationB,
        assignment_status: 'assigned',
      });

      const res = await app.inject({
        method: 'POST',
        url: '/patients/calculate-weekly-metrics',
        headers: asAdminA(),
        payload: { week_start_date: '2024-03-06', organization_id: world.orgB.organization_id },
      });

      expect(res.json()).toEqual({
        success: true,
        data: { calculated_count: 1, skipped_count: 1, error_count: 0, week_calculated: '2024-03-04' },
      });
      expect(store.tables.weeklyMetrics.map((m) => m.organization_id)).toEqual([world.orgA.organization_id]);

      const stored = await app.inject({ method: 'GET', url: '/patients/risk/week/2024-03-04', headers: asAdminA() });
      expect(stored.json<{ data: { items: unknown[] } }>().data.items).toHaveLength(1);
    });
  });
});
