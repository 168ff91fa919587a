// =============================================================================
// Attendwell API: Storage contract
//
// Route handlers and services only ever see `Repositories`, obtained through
// DataStore.withTenant (tenancy settings applied first) or DataStore.withSystem
// (no tenancy settings; tenant-owned tables are invisible).
// =============================================================================

import type { TenantContext } from '@attendwell/db';
import type {
  AssignmentStatus,
  AttendanceFacts,
  AuditActionType,
  AuditLogEntry,
  AuditLogQuery,
  AuditResourceType,
  CalculationSource,
  ComplianceStatus,
  ImportRecord,
  ImportRecordsQuery,
  ImportStatus,
  Location,
  NewAuditLogEntry,
  Organization,
  Patient,
  PatientStatus,
  PhiAccessQuery,
  Principal,
  Program,
  RecordStatus,
  RiskTier,
  User,
  UserRole,
  WeeklyMetric,
  WeeklySchedule,
} from '@attendwell/shared';

/** Raised by repositories when a write collides with a unique constraint. */
export class UniqueViolationError extends Error {
  constructor(public constraint: string) {
    super(`Unique constraint violated: ${constraint}`);
    this.name = 'UniqueViolationError';
  }
}

export interface Page<T> {
  items: T[];
  total: number;
}

// ---------------------------------------------------------------------------
// Users & organizations (outside tenant row filtering)
// ---------------------------------------------------------------------------

export interface UserCredentials extends Principal {
  password_hash: string;
}

export interface NewUser {
  username: string;
  email: string;
  password_hash: string;
  role: UserRole;
  organization_id: string | null;
  location_id: string | null;
}

export interface UserRepository {
  /** Active users only; used on every authenticated request. */
  findActivePrincipalByEmail(email: string): Promise<Principal | null>;
  /** Any activation state; used at login to tell the two failures apart. */
  findCredentialsByEmail(email: string): Promise<UserCredentials | null>;
  existsByEmailOrUsername(email: string, username: string): Promise<boolean>;
  recordLogin(userId: string, at: Date): Promise<void>;
  create(input: NewUser): Promise<User>;
  findById(userId: string): Promise<User | null>;
  /** `organizationId` null lists every tenant. */
  list(organizationId: string | null): Promise<User[]>;
  setActive(userId: string, isActive: boolean): Promise<User | null>;
}

export interface OrganizationRepository {
  findById(organizationId: string): Promise<Organization | null>;
  listActive(): Promise<Organization[]>;
}

// ---------------------------------------------------------------------------
// Patients
// ---------------------------------------------------------------------------

export interface NewPatient {
  organization_id: string;
  mr: string;
  full_name: string;
  phone: string | null;
  email: string | null;
  primary_therapist: string | null;
  admission_date: string | null;
  discharge_date: string | null;
  program_id: string | null;
  location_id: string | null;
  assignment_status: AssignmentStatus;
  status: PatientStatus;
}

/**
 * Every updatable column. `undefined` keeps the stored value, `null` clears
 * a nullable column. `assignment_status` is always written.
 */
export interface PatientPatch {
  mr?: string;
  full_name?: string;
  phone?: string | null;
  email?: string | null;
  primary_therapist?: string | null;
  admission_date?: string | null;
  discharge_date?: string | null;
  status?: PatientStatus;
  program_id?: string | null;
  location_id?: string | null;
  assignment_status: AssignmentStatus;
}

export interface PatientFilter {
  organization_id?: string;
  assignment_status?: AssignmentStatus;
  program_id?: string;
  location_id?: string;
  /** Defaults to every status except 'deleted'. */
  statuses?: PatientStatus[];
}

export interface PatientRepository {
  /** Soft-deleted patients are not returned. */
  findById(patientId: string): Promise<Patient | null>;
  list(filter: PatientFilter): Promise<Patient[]>;
  create(input: NewPatient): Promise<Patient>;
  update(patientId: string, patch: PatientPatch): Promise<Patient | null>;
  softDelete(patientId: string): Promise<boolean>;
  /** Patients whose status is not 'deleted'. */
  countReferencingProgram(programId: string): Promise<number>;
  /** Patients whose status is 'active'. */
  countActiveAtLocation(locationId: string): Promise<number>;
}

// ---------------------------------------------------------------------------
// Programs, locations, risk tiers
// ---------------------------------------------------------------------------

export interface NewProgram {
  organization_id: string;
  name: string;
  description: string | null;
  level_of_care: string | null;
  hours_per_week: number;
}

export interface ProgramPatch {
  name?: string;
  description?: string | null;
  level_of_care?: string | null;
  hours_per_week?: number;
  status?: RecordStatus;
}

export interface ProgramRepository {
  findById(programId: string): Promise<Program | null>;
  list(filter: { organization_id?: string; status?: RecordStatus }): Promise<Program[]>;
  create(input: NewProgram): Promise<Program>;
  update(programId: string, patch: ProgramPatch): Promise<Program | null>;
}

export type NewLocation = WeeklySchedule & {
  organization_id: string;
  name: string;
  timezone: string;
};

export type LocationPatch = Partial<WeeklySchedule> & {
  name?: string;
  timezone?: string;
};

export interface LocationRepository {
  findById(locationId: string): Promise<Location | null>;
  list(filter: { organization_id?: string }): Promise<Location[]>;
  create(input: NewLocation): Promise<Location>;
  update(locationId: string, patch: LocationPatch): Promise<Location | null>;
  /** Patients still pointing at the location are moved back to pending. */
  delete(locationId: string): Promise<boolean>;
}

export interface NewRiskTier {
  organization_id: string;
  tier_label: string;
  tier_description: string;
  recommended_actions: string;
  risk_level_range_low: number;
  risk_level_range_high: number;
  color: string;
  sort_order: number;
  auto_flag_for_followup: boolean;
}

export type RiskTierPatch = Partial<Omit<NewRiskTier, 'organization_id'>> & { status?: RecordStatus };

export interface RiskTierRepository {
  findById(tierId: string): Promise<RiskTier | null>;
  /** Ordered by sort_order, then tier_label. */
  list(filter: { organization_id?: string; status?: RecordStatus }): Promise<RiskTier[]>;
  create(input: NewRiskTier): Promise<RiskTier>;
  update(tierId: string, patch: RiskTierPatch): Promise<RiskTier | null>;
  delete(tierId: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Weekly metrics & attendance
// ---------------------------------------------------------------------------

export interface WeeklyMetricInput {
  patient_id: string;
  organization_id: string;
  week_start_date: string;
  hours_attended: number;
  hours_required: number;
  hours_remaining_needed: number;
  sessions_attended: number;
  sessions_missed: number;
  total_clinic_hours_available: number;
  clinic_hours_remaining: number;
  risk_score: number;
  risk_tier_id: string | null;
  compliance_status: ComplianceStatus;
  needs_followup: boolean;
  calculation_source: CalculationSource;
}

export interface WeeklyMetricRepository {
  /** Insert, or overwrite the row already stored for (patient, week). */
  upsert(input: WeeklyMetricInput): Promise<WeeklyMetric>;
  listForWeek(weekStart: string, organizationId?: string): Promise<WeeklyMetric[]>;
}

export interface AttendanceRepository {
  /**
   * Attendance for [weekStart, weekStart + 7 days) from processed session
   * records, matched to patients by (organization, MR). Patients without
   * records are absent from the map.
   */
  weekFacts(weekStart: string, patients: ReadonlyArray<Pick<Patient, 'patient_id' | 'organization_id' | 'mr'>>): Promise<Map<string, AttendanceFacts>>;
  /**
   * Hours used at each location in the same UTC week by attended sessions.
   * A group session counts once however many patients attended it, and
   * locations with no sessions are absent from the map.
   */
  locationHoursUsed(weekStart: string, locationIds: readonly string[]): Promise<Map<string, number>>;
}

// ---------------------------------------------------------------------------
// Imports
// ---------------------------------------------------------------------------

export type ImportStatusCounts = Record<ImportStatus, number>;

export interface ImportSummary extends ImportStatusCounts {
  total_records: number;
  latest_import: Date | null;
}

export interface ImportGroup {
  organization_id: string;
  location_id: string | null;
  total_records: number;
  status_breakdown: Partial<ImportStatusCounts>;
  latest_import: Date | null;
  recent_files: string[];
  processing_errors: Array<{ error_message: string; occurred_at: Date }>;
}

export interface ImportRepository {
  summary(): Promise<ImportSummary>;
  recentFiles(limit: number): Promise<string[]>;
  files(limit: number): Promise<Array<{ file_name: string; record_count: number; latest_import: Date }>>;
  overview(): Promise<ImportGroup[]>;
  list(query: ImportRecordsQuery): Promise<Page<ImportRecord>>;
  findById(recordId: string): Promise<ImportRecord | null>;
  /** Moves an error/skipped record back to pending; null if absent or in any other status. */
  resetToPending(recordId: string): Promise<ImportRecord | null>;
  errors(limit: number): Promise<ImportRecord[]>;
}

// ---------------------------------------------------------------------------
// Audit trail
// ---------------------------------------------------------------------------

export interface AuditSummary {
  window_hours: number;
  total_requests: number;
  unique_users: number;
  phi_access_count: number;
  failed_requests: number;
  access_denied_count: number;
  export_count: number;
  by_action: Partial<Record<AuditActionType, number>>;
  by_resource: Partial<Record<AuditResourceType, number>>;
  top_endpoints: Array<{ endpoint: string; count: number }>;
}

export interface AuditRepository {
  insert(entry: NewAuditLogEntry): Promise<void>;
  list(query: AuditLogQuery): Promise<Page<AuditLogEntry>>;
  listPhiAccess(query: PhiAccessQuery): Promise<AuditLogEntry[]>;
  /** 401 and 403 responses since `since`, newest first. */
  listFailedAccess(since: Date): Promise<AuditLogEntry[]>;
  summary(since: Date, windowHours: number): Promise<AuditSummary>;
  deleteOlderThan(cutoff: Date): Promise<number>;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface Repositories {
  users: UserRepository;
  organizations: OrganizationRepository;
  patients: PatientRepository;
  programs: ProgramRepository;
  locations: LocationRepository;
  riskTiers: RiskTierRepository;
  weeklyMetrics: WeeklyMetricRepository;
  attendance: AttendanceRepository;
  imports: ImportRepository;
  audit: AuditRepository;
}

export interface DataStore {
  /**
   * One transaction on one pooled connection with `ctx` applied before `fn`
   * runs. Commits on resolve, rolls back on throw.
   */
  withTenant<T>(ctx: TenantContext, fn: (repos: Repositories) => Promise<T>): Promise<T>;
  /** One transaction with no tenancy settings. */
  withSystem<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
