import type { AssignmentStatus } from '../types/index.js';

/** A patient is assigned once both a program and a location are set. */
export function deriveAssignmentStatus(
  programId: string | null,
  locationId: string | null,
): AssignmentStatus {
  return programId !== null && locationId !== null ? 'assigned' : 'pending';
}
