// =============================================================================
// Attendwell: Shared Constants
// =============================================================================

import type { AuditResourceType, DayOfWeek, UserRole } from '../types/index.js';

// ---------------------------------------------------------------------------
// Roles
// ---------------------------------------------------------------------------

export const ROLES = {
  SUPERUSER: 'system_admin',
  TENANT_ADMIN: 'organization_admin',
  USER: 'user',
} as const satisfies Record<string, UserRole>;

export const ADMIN_ROLES: readonly UserRole[] = [ROLES.SUPERUSER, ROLES.TENANT_ADMIN];

// ---------------------------------------------------------------------------
// Risk scoring
// ---------------------------------------------------------------------------

/** Largest value the weekly_metrics.risk_score NUMERIC(6,2) column holds. */
export const MAX_RISK_SCORE = 999.99;

export const DAYS_OF_WEEK: readonly DayOfWeek[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

// ---------------------------------------------------------------------------
// Audit decision tables
// ---------------------------------------------------------------------------

/** Requests under these prefixes are never written to the audit trail. */
export const AUDIT_EXCLUDED_PREFIXES: readonly string[] = [
  '/health',
  '/docs',
  '/redoc',
  '/openapi.json',
  '/favicon.ico',
  '/static',
];

export const AUDIT_LOGIN_PATH = '/auth/login';
export const AUDIT_LOGOUT_PATH = '/auth/logout';

/** Path segments whose presence marks the request as touching PHI. */
export const PHI_PATH_SEGMENTS: readonly string[] = ['patients', 'engagement', 'risk'];

export const EXPORT_PATH_SEGMENTS: readonly string[] = ['export', 'download'];

/** Ordered: the first matching segment of the path wins. */
export const AUDIT_RESOURCE_SEGMENTS: ReadonlyArray<readonly [string, AuditResourceType]> = [
  ['auth', 'AUTH'],
  ['patients', 'PATIENT'],
  ['users', 'USER'],
  ['organizations', 'ORGANIZATION'],
  ['locations', 'LOCATION'],
  ['programs', 'PROGRAM'],
  ['engagement', 'ENGAGEMENT'],
  ['risk', 'RISK'],
];

// ---------------------------------------------------------------------------
// Validation limits
// ---------------------------------------------------------------------------

export const LIMITS = {
  HOURS_PER_WEEK_MAX: 168,
  NAME_MAX: 255,
  MR_MAX: 100,
  TIER_LABEL_MAX: 50,
  PASSWORD_MIN: 8,
  PASSWORD_MAX: 128,
  IMPORT_RECORDS_PAGE_MAX: 200,
  IMPORT_ERRORS_PAGE_MAX: 100,
  DASHBOARD_PAGE_DEFAULT: 100,
  DASHBOARD_PAGE_MAX: 500,
  AUDIT_PAGE_DEFAULT: 100,
  AUDIT_PAGE_MAX: 1000,
  AUDIT_RETENTION_MONTHS_DEFAULT: 84,
} as const;
