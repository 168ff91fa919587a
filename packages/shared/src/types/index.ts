// =============================================================================
// Attendwell: Shared Entity Types
// Mirrors packages/db/migrations. Keep in sync when the schema changes.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums (mirror CHECK constraints)
// ---------------------------------------------------------------------------

export type UserRole = 'system_admin' | 'organization_admin' | 'user';

export type OrganizationStatus = 'active' | 'inactive';

export type RecordStatus = 'active' | 'inactive';

export type PatientStatus = 'active' | 'inactive' | 'deleted';

export type AssignmentStatus = 'assigned' | 'pending';

export type ComplianceStatus = 'compliant' | 'at_risk' | 'non_compliant' | 'unassigned';

export type EngagementCategory = 'engaged' | 'partial' | 'unengaged' | 'unassigned';

export type CalculationSource = 'scheduled' | 'manual';

export type ServiceType = 'session' | 'evaluation';

export type ImportStatus = 'pending' | 'processing' | 'processed' | 'error' | 'skipped';

export type AuditActionType =
  | 'LOGIN'
  | 'LOGOUT'
  | 'CREATE'
  | 'READ'
  | 'UPDATE'
  | 'DELETE'
  | 'EXPORT'
  | 'ACCESS_DENIED';

export type AuditResourceType =
  | 'AUTH'
  | 'PATIENT'
  | 'USER'
  | 'ORGANIZATION'
  | 'LOCATION'
  | 'PROGRAM'
  | 'ENGAGEMENT'
  | 'RISK'
  | 'SYSTEM';

// ---------------------------------------------------------------------------
// Identity & tenancy
// ---------------------------------------------------------------------------

/** Authenticated actor. `organization_id` is null only for system admins. */
export interface Principal {
  user_id: string;
  username: string;
  email: string;
  role: UserRole;
  organization_id: string | null;
  location_id: string | null;
  is_active: boolean;
}

export interface User extends Principal {
  created_at: Date;
  updated_at: Date;
  last_login: Date | null;
}

export interface Organization {
  organization_id: string;
  name: string;
  status: OrganizationStatus;
  created_at: Date;
  updated_at: Date;
}

// ---------------------------------------------------------------------------
// Clinical administration
// ---------------------------------------------------------------------------

export interface Program {
  program_id: string;
  organization_id: string;
  name: string;
  description: string | null;
  level_of_care: string | null;
  hours_per_week: number;
  status: RecordStatus;
  created_at: Date;
  updated_at: Date;
}

export type DayOfWeek =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday';

/** 'HH:MM' or 'HH:MM:SS', local to the location's timezone. */
export type ClockTime = string;

export type WeeklySchedule = {
  [K in DayOfWeek as `${K}_open` | `${K}_close`]: ClockTime | null;
};

export interface Location extends WeeklySchedule {
  location_id: string;
  organization_id: string;
  name: string;
  timezone: string;
  created_at: Date;
  updated_at: Date;
}

export interface LocationStats {
  total_patients: number;
  assigned_patients: number;
  pending_patients: number;
  weekly_hours_total: number;
  remaining_hours_this_week: number;
}

export interface Patient {
  patient_id: string;
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
  created_at: Date;
  updated_at: Date;
}

export interface RiskTier {
  tier_id: string;
  organization_id: string;
  tier_label: string;
  tier_description: string;
  recommended_actions: string;
  risk_level_range_low: number;
  risk_level_range_high: number;
  color: string;
  sort_order: number;
  auto_flag_for_followup: boolean;
  status: RecordStatus;
  created_at: Date;
  updated_at: Date;
}

export interface WeeklyMetric {
  metric_id: string;
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
  calculated_at: Date;
  calculation_source: CalculationSource;
}

// ---------------------------------------------------------------------------
// Imported attendance
// ---------------------------------------------------------------------------

export interface ImportRecord {
  record_id: string;
  organization_id: string;
  location_id: string | null;
  service_type: ServiceType;
  file_name: string | null;
  mr: string | null;
  full_name: string | null;
  session_name: string | null;
  provider: string | null;
  started: Date | null;
  ended: Date | null;
  /** Minutes. */
  duration: number | null;
  attended: number | null;
  absent: number | null;
  status: ImportStatus;
  error_message: string | null;
  imported_at: Date;
  processed_at: Date | null;
}

export interface AttendanceFacts {
  hours_attended: number;
  sessions_attended: number;
  sessions_missed: number;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export interface AuditLogEntry {
  log_id: string;
  timestamp: Date;
  user_id: string | null;
  user_email: string | null;
  user_role: UserRole | null;
  organization_id: string | null;
  session_id: string | null;
  method: string;
  endpoint: string;
  full_url: string;
  user_agent: string | null;
  ip_address: string | null;
  status_code: number;
  response_time_ms: number;
  action_type: AuditActionType;
  resource_type: AuditResourceType;
  resource_id: string | null;
  phi_accessed: boolean;
  patient_id: string | null;
  data_exported: boolean;
  request_body_hash: string | null;
  query_parameters: Record<string, string> | null;
}

export type NewAuditLogEntry = Omit<AuditLogEntry, 'log_id' | 'timestamp'>;

// ---------------------------------------------------------------------------
// API envelope
// ---------------------------------------------------------------------------

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ApiResponse<T> = ApiSuccess<T> | ApiError;

export interface Pagination {
  total: number;
  limit: number;
  offset: number;
  has_more: boolean;
}
