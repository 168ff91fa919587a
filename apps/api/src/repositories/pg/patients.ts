import type { TransactionSql } from '@attendwell/db';
import type { Patient, PatientStatus } from '@attendwell/shared';
import type { NewPatient, PatientPatch, PatientRepository } from '../types.js';
import { translateUnique } from './errors.js';

const VISIBLE_STATUSES: PatientStatus[] = ['active', 'inactive'];

const PATIENT_COLUMNS = [
  'patient_id', 'organization_id', 'mr', 'full_name', 'phone', 'email', 'primary_therapist',
  'admission_date', 'discharge_date', 'program_id', 'location_id', 'assignment_status', 'status',
  'created_at', 'updated_at',
];

export function pgPatients(tx: TransactionSql): PatientRepository {
  const columns = tx(PATIENT_COLUMNS);

  return {
    async findById(patientId) {
      const [row] = await tx<Patient[]>`
        SELECT ${columns} FROM patients
        WHERE patient_id = ${patientId} AND status <> 'deleted'
      `;
      return row ?? null;
    },

    async list(filter) {
      const statuses = filter.statuses ?? VISIBLE_STATUSES;
      return tx<Patient[]>`
        SELECT ${columns} FROM patients
        WHERE status = ANY(${tx.array(statuses)}::TEXT[])
          AND (${filter.organization_id ?? null}::UUID IS NULL OR organization_id = ${filter.organization_id ?? null})
          AND (${filter.assignment_status ?? null}::TEXT IS NULL OR assignment_status = ${filter.assignment_status ?? null})
          AND (${filter.program_id ?? null}::UUID IS NULL OR program_id = ${filter.program_id ?? null})
          AND (${filter.location_id ?? null}::UUID IS NULL OR location_id = ${filter.location_id ?? null})
        ORDER BY full_name, mr
      `;
    },

    async create(input: NewPatient) {
      const [row] = await translateUnique(tx<Patient[]>`
        INSERT INTO patients (
          organization_id, mr, full_name, phone, email, primary_therapist,
          admission_date, discharge_date, program_id, location_id, assignment_status, status
        ) VALUES (
          ${input.organization_id}, ${input.mr}, ${input.full_name}, ${input.phone}, ${input.email},
          ${input.primary_therapist}, ${input.admission_date}::DATE, ${input.discharge_date}::DATE,
          ${input.program_id}, ${input.location_id}, ${input.assignment_status}, ${input.status}
        )
        RETURNING ${columns}
      `);
      if (!row) throw new Error('Patient insert returned no row');
      return row;
    },

    async update(patientId, patch: PatientPatch) {
      const [row] = await translateUnique(tx<Patient[]>`
        UPDATE patients SET
          mr                = COALESCE(${patch.mr ?? null}, mr),
          full_name         = COALESCE(${patch.full_name ?? null}, full_name),
          phone             = CASE WHEN ${patch.phone !== undefined} THEN ${patch.phone ?? null} ELSE phone END,
          email             = CASE WHEN ${patch.email !== undefined} THEN ${patch.email ?? null} ELSE email END,
          primary_therapist = CASE WHEN ${patch.primary_therapist !== undefined} THEN ${patch.primary_therapist ?? null} ELSE primary_therapist END,
          admission_date    = CASE WHEN ${patch.admission_date !== undefined} THEN ${patch.admission_date ?? null}::DATE ELSE admission_date END,
          discharge_date    = CASE WHEN ${patch.discharge_date !== undefined} THEN ${patch.discharge_date ?? null}::DATE ELSE discharge_date END,
          status            = COALESCE(${patch.status ?? null}, status),
          program_id        = CASE WHEN ${patch.program_id !== undefined} THEN ${patch.program_id ?? null}::UUID ELSE program_id END,
          location_id       = CASE WHEN ${patch.location_id !== undefined} THEN ${patch.location_id ?? null}::UUID ELSE location_id END,
          assignment_status = ${patch.assignment_status},
          updated_at        = NOW()
        WHERE patient_id = ${patientId} AND status <> 'deleted'
        RETURNING ${columns}
      `);
      return row ?? null;
    },

    async softDelete(patientId) {
      const rows = await tx`
        UPDATE patients SET status = 'deleted', updated_at = NOW()
        WHERE patient_id = ${patientId} AND status <> 'deleted'
      `;
      return rows.count > 0;
    },

    async countReferencingProgram(programId) {
      const [row] = await tx<{ count: number }[]>`
        SELECT COUNT(*)::INT AS count FROM patients
        WHERE program_id = ${programId} AND status <> 'deleted'
      `;
      return row?.count ?? 0;
    },

    async countActiveAtLocation(locationId) {
      const [row] = await tx<{ count: number }[]>`
        SELECT COUNT(*)::INT AS count FROM patients
        WHERE location_id = ${locationId} AND status = 'active'
      `;
      return row?.count ?? 0;
    },
  };
}
