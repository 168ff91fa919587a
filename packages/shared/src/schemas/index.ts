// =============================================================================
// Attendwell: Zod Validation Schemas
// Used for API request validation in apps/api.
// =============================================================================

import { z } from 'zod';
import { DAYS_OF_WEEK, LIMITS } from '../constants/index.js';
import type { DayOfWeek } from '../types/index.js';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const UuidSchema = z.string().uuid();

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be a date in YYYY-MM-DD format');

export const ClockTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, 'Must be a time in HH:MM or HH:MM:SS format');

export const TimezoneSchema = z.string().refine(
  (tz) => {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: tz });
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Must be an IANA timezone name' },
);

export const UserRoleSchema = z.enum(['system_admin', 'organization_admin', 'user']);
export const AssignmentStatusSchema = z.enum(['assigned', 'pending']);
export const ComplianceStatusSchema = z.enum(['compliant', 'at_risk', 'non_compliant', 'unassigned']);
export const EngagementCategorySchema = z.enum(['engaged', 'partial', 'unengaged', 'unassigned']);
export const RecordStatusSchema = z.enum(['active', 'inactive']);
export const ImportStatusSchema = z.enum(['pending', 'processing', 'processed', 'error', 'skipped']);
export const ServiceTypeSchema = z.enum(['session', 'evaluation']);

/** Query-string boolean: only the literals 'true' and 'false' are accepted. */
const QueryBoolSchema = z.enum(['true', 'false']).transform((v) => v === 'true');

function hasAnyField(value: Record<string, unknown>): boolean {
  return Object.values(value).some((v) => v !== undefined);
}

const NO_FIELDS = { message: 'No fields to update' };

// ---------------------------------------------------------------------------
// Auth & users
// ---------------------------------------------------------------------------

export const LoginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1).max(LIMITS.PASSWORD_MAX),
});
export type LoginInput = z.infer<typeof LoginSchema>;

export const ForgotPasswordSchema = z.object({
  email: z.string().email(),
});

export const CreateUserSchema = z.object({
  username: z.string().min(3).max(100),
  email: z.string().email(),
  password: z.string().min(LIMITS.PASSWORD_MIN).max(LIMITS.PASSWORD_MAX),
  role: UserRoleSchema,
  organization_id: UuidSchema.nullable().optional(),
  location_id: UuidSchema.nullable().optional(),
});
export type CreateUserInput = z.infer<typeof CreateUserSchema>;

// ---------------------------------------------------------------------------
// Patients
// ---------------------------------------------------------------------------

export const PatientCreateSchema = z.object({
  mr: z.string().min(1).max(LIMITS.MR_MAX),
  full_name: z.string().min(1).max(LIMITS.NAME_MAX),
  phone: z.string().max(50).nullable().optional(),
  email: z.string().email().max(LIMITS.NAME_MAX).nullable().optional(),
  primary_therapist: z.string().max(LIMITS.NAME_MAX).nullable().optional(),
  admission_date: IsoDateSchema.nullable().optional(),
  discharge_date: IsoDateSchema.nullable().optional(),
  status: z.enum(['active', 'inactive']).default('active'),
  organization_id: UuidSchema.optional(),
  program_id: UuidSchema.nullable().optional(),
  location_id: UuidSchema.nullable().optional(),
});
export type PatientCreateInput = z.infer<typeof PatientCreateSchema>;

/**
 * Every updatable patient field. `undefined` leaves the column untouched;
 * `null` clears it where the column is nullable.
 */
export const PatientUpdateSchema = z
  .object({
    mr: z.string().min(1).max(LIMITS.MR_MAX).optional(),
    full_name: z.string().min(1).max(LIMITS.NAME_MAX).optional(),
    phone: z.string().max(50).nullable().optional(),
    email: z.string().email().max(LIMITS.NAME_MAX).nullable().optional(),
    primary_therapist: z.string().max(LIMITS.NAME_MAX).nullable().optional(),
    admission_date: IsoDateSchema.nullable().optional(),
    discharge_date: IsoDateSchema.nullable().optional(),
    status: z.enum(['active', 'inactive']).optional(),
    program_id: UuidSchema.nullable().optional(),
    location_id: UuidSchema.nullable().optional(),
  })
  .strict()
  .refine(hasAnyField, NO_FIELDS);
export type PatientUpdateInput = z.infer<typeof PatientUpdateSchema>;

export const PatientListQuerySchema = z.object({
  assignment_status: AssignmentStatusSchema.optional(),
});

export const PatientAssignmentSchema = z.object({
  patient_id: UuidSchema,
  program_id: UuidSchema,
  location_id: UuidSchema,
});
export type PatientAssignmentInput = z.infer<typeof PatientAssignmentSchema>;

export const BulkPatientAssignmentSchema = z.object({
  assignments: z.array(PatientAssignmentSchema).min(1).max(500),
});

export const CurrentWeekRiskQuerySchema = z.object({
  compliance_status: ComplianceStatusSchema.optional(),
});

export const WeeklyCalculationSchema = z.object({
  organization_id: UuidSchema.optional(),
  week_start_date: IsoDateSchema.optional(),
});

// ---------------------------------------------------------------------------
// Programs
// ---------------------------------------------------------------------------

const HoursPerWeekSchema = z.number().min(0).max(LIMITS.HOURS_PER_WEEK_MAX);

export const ProgramCreateSchema = z.object({
  name: z.string().min(1).max(LIMITS.NAME_MAX),
  description: z.string().nullable().optional(),
  level_of_care: z.string().max(100).nullable().optional(),
  hours_per_week: HoursPerWeekSchema,
  organization_id: UuidSchema.optional(),
});
export type ProgramCreateInput = z.infer<typeof ProgramCreateSchema>;

export const ProgramUpdateSchema = z
  .object({
    name: z.string().min(1).max(LIMITS.NAME_MAX).optional(),
    description: z.string().nullable().optional(),
    level_of_care: z.string().max(100).nullable().optional(),
    hours_per_week: HoursPerWeekSchema.optional(),
    status: RecordStatusSchema.optional(),
  })
  .strict()
  .refine(hasAnyField, NO_FIELDS);
export type ProgramUpdateInput = z.infer<typeof ProgramUpdateSchema>;

// ---------------------------------------------------------------------------
// Risk tiers
// ---------------------------------------------------------------------------

const RiskTierFields = {
  tier_label: z.string().min(1).max(LIMITS.TIER_LABEL_MAX),
  tier_description: z.string(),
  recommended_actions: z.string(),
  risk_level_range_low: z.number().min(0),
  risk_level_range_high: z.number().min(0),
  color: z.string().min(1).max(50),
  sort_order: z.number().int(),
  auto_flag_for_followup: z.boolean(),
};

export const RiskTierCreateSchema = z
  .object({
    ...RiskTierFields,
    sort_order: RiskTierFields.sort_order.default(0),
    auto_flag_for_followup: RiskTierFields.auto_flag_for_followup.default(false),
    organization_id: UuidSchema.optional(),
  })
  .refine((t) => t.risk_level_range_low < t.risk_level_range_high, {
    message: 'risk_level_range_low must be less than risk_level_range_high',
    path: ['risk_level_range_low'],
  });
export type RiskTierCreateInput = z.infer<typeof RiskTierCreateSchema>;

export const RiskTierUpdateSchema = z
  .object({
    tier_label: RiskTierFields.tier_label.optional(),
    tier_description: RiskTierFields.tier_description.optional(),
    recommended_actions: RiskTierFields.recommended_actions.optional(),
    risk_level_range_low: RiskTierFields.risk_level_range_low.optional(),
    risk_level_range_high: RiskTierFields.risk_level_range_high.optional(),
    color: RiskTierFields.color.optional(),
    sort_order: RiskTierFields.sort_order.optional(),
    auto_flag_for_followup: RiskTierFields.auto_flag_for_followup.optional(),
    status: RecordStatusSchema.optional(),
  })
  .strict()
  .refine(hasAnyField, NO_FIELDS);
export type RiskTierUpdateInput = z.infer<typeof RiskTierUpdateSchema>;

// ---------------------------------------------------------------------------
// Locations
// ---------------------------------------------------------------------------

const OptionalClockTime = ClockTimeSchema.nullable().optional();

const scheduleShape = {
  monday_open: OptionalClockTime,
  monday_close: OptionalClockTime,
  tuesday_open: OptionalClockTime,
  tuesday_close: OptionalClockTime,
  wednesday_open: OptionalClockTime,
  wednesday_close: OptionalClockTime,
  thursday_open: OptionalClockTime,
  thursday_close: OptionalClockTime,
  friday_open: OptionalClockTime,
  friday_close: OptionalClockTime,
  saturday_open: OptionalClockTime,
  saturday_close: OptionalClockTime,
  sunday_open: OptionalClockTime,
  sunday_close: OptionalClockTime,
};

type SchedulePatch = { [K in `${DayOfWeek}_open` | `${DayOfWeek}_close`]?: string | null };

function secondsOf(time: string): number {
  const [h = '0', m = '0', s = '0'] = time.split(':');
  return Number(h) * 3600 + Number(m) * 60 + Number(s);
}

/**
 * Per-day checks on the days the payload touches: open and close travel
 * together, and close comes after open.
 */
function checkScheduleDays(value: SchedulePatch, ctx: z.RefinementCtx): void {
  for (const day of DAYS_OF_WEEK) {
    const open = value[`${day}_open`];
    const close = value[`${day}_close`];
    if (open === undefined && close === undefined) continue;
    const hasOpen = open !== undefined && open !== null;
    const hasClose = close !== undefined && close !== null;
    if (hasOpen !== hasClose) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${day}_open and ${day}_close must both be set or both be empty`,
        path: [`${day}_open`],
      });
      continue;
    }
    if (hasOpen && hasClose && secondsOf(close) <= secondsOf(open)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${day}_close must be after ${day}_open`,
        path: [`${day}_close`],
      });
    }
  }
}

export const LocationCreateSchema = z
  .object({
    name: z.string().min(1).max(LIMITS.NAME_MAX),
    timezone: TimezoneSchema.default('America/New_York'),
    organization_id: UuidSchema.optional(),
    ...scheduleShape,
  })
  .superRefine(checkScheduleDays);
export type LocationCreateInput = z.infer<typeof LocationCreateSchema>;

export const LocationUpdateSchema = z
  .object({
    name: z.string().min(1).max(LIMITS.NAME_MAX).optional(),
    timezone: TimezoneSchema.optional(),
    ...scheduleShape,
  })
  .strict()
  .superRefine(checkScheduleDays)
  .refine(hasAnyField, NO_FIELDS);
export type LocationUpdateInput = z.infer<typeof LocationUpdateSchema>;

export const LocationTimingsSchema = z
  .object({
    timezone: TimezoneSchema.optional(),
    ...scheduleShape,
  })
  .strict()
  .superRefine(checkScheduleDays)
  .refine(hasAnyField, NO_FIELDS);
export type LocationTimingsInput = z.infer<typeof LocationTimingsSchema>;

// ---------------------------------------------------------------------------
// Engagement dashboard
// ---------------------------------------------------------------------------

export const DashboardQuerySchema = z.object({
  location_id: UuidSchema.optional(),
  program_id: UuidSchema.optional(),
  assignment_status: AssignmentStatusSchema.optional(),
  compliance_status: ComplianceStatusSchema.optional(),
  engagement_category: EngagementCategorySchema.optional(),
  risk_category: z.string().min(1).max(LIMITS.TIER_LABEL_MAX).optional(),
  limit: z.coerce.number().int().min(1).max(LIMITS.DASHBOARD_PAGE_MAX).default(LIMITS.DASHBOARD_PAGE_DEFAULT),
  offset: z.coerce.number().int().min(0).default(0),
});
export type DashboardQuery = z.infer<typeof DashboardQuerySchema>;

export const DashboardSummaryQuerySchema = z.object({
  location_id: UuidSchema.optional(),
});

// ---------------------------------------------------------------------------
// Data import
// ---------------------------------------------------------------------------

export const ImportRecordsQuerySchema = z.object({
  status: ImportStatusSchema.optional(),
  service_type: ServiceTypeSchema.optional(),
  file_name: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(LIMITS.IMPORT_RECORDS_PAGE_MAX).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});
export type ImportRecordsQuery = z.infer<typeof ImportRecordsQuerySchema>;

export const ImportErrorsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(LIMITS.IMPORT_ERRORS_PAGE_MAX).default(20),
});

// ---------------------------------------------------------------------------
// Audit retrieval
// ---------------------------------------------------------------------------

const DateTimeQuerySchema = z.coerce.date();

export const AuditLogQuerySchema = z.object({
  user_id: UuidSchema.optional(),
  user_email: z.string().min(1).optional(),
  action_type: z
    .enum(['LOGIN', 'LOGOUT', 'CREATE', 'READ', 'UPDATE', 'DELETE', 'EXPORT', 'ACCESS_DENIED'])
    .optional(),
  resource_type: z
    .enum(['AUTH', 'PATIENT', 'USER', 'ORGANIZATION', 'LOCATION', 'PROGRAM', 'ENGAGEMENT', 'RISK', 'SYSTEM'])
    .optional(),
  phi_accessed: QueryBoolSchema.optional(),
  start_date: DateTimeQuerySchema.optional(),
  end_date: DateTimeQuerySchema.optional(),
  ip_address: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(LIMITS.AUDIT_PAGE_MAX).default(LIMITS.AUDIT_PAGE_DEFAULT),
  offset: z.coerce.number().int().min(0).default(0),
});
export type AuditLogQuery = z.infer<typeof AuditLogQuerySchema>;

export const PhiAccessQuerySchema = z.object({
  patient_id: UuidSchema.optional(),
  start_date: DateTimeQuerySchema.optional(),
  end_date: DateTimeQuerySchema.optional(),
  limit: z.coerce.number().int().min(1).max(LIMITS.AUDIT_PAGE_MAX).default(LIMITS.AUDIT_PAGE_DEFAULT),
});
export type PhiAccessQuery = z.infer<typeof PhiAccessQuerySchema>;

export const HoursWindowQuerySchema = z.object({
  hours: z.coerce.number().int().min(1).max(24 * 90).default(24),
});

export const AuditCleanupQuerySchema = z.object({
  retention_months: z.coerce.number().int().min(1).max(1200).optional(),
});
