// =============================================================================
// Attendwell API: Patient program/location references
//
// A patient may only point at an active program and a location of its own
// organization. A reference the caller cannot see through tenancy filtering
// is reported the same way as one that belongs to another organization.
// =============================================================================

import { deriveAssignmentStatus, type Patient, type PatientAssignmentInput } from '@attendwell/shared';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import type { Repositories } from '../repositories/types.js';

export interface References {
  program_id?: string | null;
  location_id?: string | null;
}

export async function assertReferencesInOrganization(
  repos: Repositories,
  organizationId: string,
  refs: References,
): Promise<void> {
  if (refs.program_id) {
    const program = await repos.programs.findById(refs.program_id);
    if (!program || program.organization_id !== organizationId) {
      throw new ValidationError('Program not found in the patient\'s organization');
    }
    if (program.status !== 'active') {
      throw new ValidationError('Program is not active');
    }
  }
  if (refs.location_id) {
    const location = await repos.locations.findById(refs.location_id);
    if (!location || location.organization_id !== organizationId) {
      throw new ValidationError('Location not found in the patient\'s organization');
    }
  }
}

/** Points an existing patient at a program and a location. */
export async function assignPatient(repos: Repositories, input: PatientAssignmentInput): Promise<Patient> {
  const patient = await repos.patients.findById(input.patient_id);
  if (!patient) throw new NotFoundError('Patient');

  await assertReferencesInOrganization(repos, patient.organization_id, input);

  const updated = await repos.patients.update(patient.patient_id, {
    program_id: input.program_id,
    location_id: input.location_id,
    assignment_status: deriveAssignmentStatus(input.program_id, input.location_id),
  });
  if (!updated) throw new NotFoundError('Patient');
  return updated;
}
