// =============================================================================
// Attendwell API: Patient week view
//
// Joins patients to their program, location, the tenant's risk tiers and the
// week's attendance, then classifies each one. Backs the live risk endpoints,
// the engagement dashboard, the high-risk export and the weekly job.
// =============================================================================

import type {
  AssignmentStatus,
  ComplianceStatus,
  EngagementCategory,
  Location,
  Patient,
  Program,
  RiskTier,
} from '@attendwell/shared';
import type { PatientFilter, Repositories } from '../repositories/types.js';
import { remainingClinicHours, weeklyScheduledHours } from './clinicHours.js';
import {
  classify,
  completionPercentage,
  engagementCategory,
  riskCategory,
} from './riskClassifier.js';

export interface PatientWeekView {
  patient_id: string;
  organization_id: string;
  mr: string;
  full_name: string;
  phone: string | null;
  email: string | null;
  primary_therapist: string | null;
  assignment_status: AssignmentStatus;
  program_id: string | null;
  location_id: string | null;
  program_name: string | null;
  level_of_care: string | null;
  location_name: string | null;
  location_timezone: string | null;
  week_start_date: string;
  hours_required: number;
  hours_attended: number;
  hours_remaining_needed: number;
  sessions_attended: number;
  sessions_missed: number;
  clinic_hours_total: number;
  clinic_hours_remaining: number;
  risk_score: number;
  compliance_status: ComplianceStatus;
  tier_id: string | null;
  risk_level: string | null;
  tier_description: string | null;
  recommended_actions: string | null;
  risk_color: string | null;
  needs_followup: boolean;
  engagement_category: EngagementCategory;
  risk_category: string;
  completion_percentage: number;
}

export interface WeekViewOptions {
  weekStart: string;
  filter: PatientFilter;
}

function byId<T>(rows: T[], key: (row: T) => string): Map<string, T> {
  return new Map(rows.map((row) => [key(row), row]));
}

function tiersByOrganization(tiers: RiskTier[]): Map<string, RiskTier[]> {
  const grouped = new Map<string, RiskTier[]>();
  for (const tier of tiers) {
    const list = grouped.get(tier.organization_id) ?? [];
    list.push(tier);
    grouped.set(tier.organization_id, list);
  }
  return grouped;
}

export function buildWeekView(
  patient: Patient,
  program: Program | null,
  location: Location | null,
  tiers: readonly RiskTier[],
  facts: { hours_attended: number; sessions_attended: number; sessions_missed: number },
  weekStart: string,
  locationHoursUsed: number,
): PatientWeekView {
  const assigned = patient.assignment_status === 'assigned' && program !== null && location !== null;
  const hoursRequired = program?.hours_per_week ?? 0;
  const clinicHoursTotal = location ? weeklyScheduledHours(location) : 0;
  const clinicHoursRemaining = location ? remainingClinicHours(location, locationHoursUsed) : 0;

  const result = classify({
    assigned,
    hoursAttended: facts.hours_attended,
    hoursRequired,
    clinicHoursRemaining,
    tiers,
  });
  const tier = result.matchedTier;

  return {
    patient_id: patient.patient_id,
    organization_id: patient.organization_id,
    mr: patient.mr,
    full_name: patient.full_name,
    phone: patient.phone,
    email: patient.email,
    primary_therapist: patient.primary_therapist,
    assignment_status: patient.assignment_status,
    program_id: patient.program_id,
    location_id: patient.location_id,
    program_name: program?.name ?? null,
    level_of_care: program?.level_of_care ?? null,
    location_name: location?.name ?? null,
    location_timezone: location?.timezone ?? null,
    week_start_date: weekStart,
    hours_required: hoursRequired,
    hours_attended: facts.hours_attended,
    hours_remaining_needed: result.hoursRemainingNeeded,
    sessions_attended: facts.sessions_attended,
    sessions_missed: facts.sessions_missed,
    clinic_hours_total: clinicHoursTotal,
    clinic_hours_remaining: clinicHoursRemaining,
    risk_score: result.riskScore,
    compliance_status: result.complianceStatus,
    tier_id: tier?.tier_id ?? null,
    risk_level: tier?.tier_label ?? null,
    tier_description: tier?.tier_description ?? null,
    recommended_actions: tier?.recommended_actions ?? null,
    risk_color: tier?.color ?? null,
    needs_followup: result.needsFollowup,
    engagement_category: engagementCategory(assigned, facts.hours_attended, result.hoursRemainingNeeded),
    risk_category: riskCategory(tier),
    completion_percentage: completionPercentage(facts.hours_attended, hoursRequired),
  };
}

const NO_ATTENDANCE = { hours_attended: 0, sessions_attended: 0, sessions_missed: 0 };

/** Classified view of every patient matching `filter` for one week. */
export async function loadWeekView(repos: Repositories, options: WeekViewOptions): Promise<PatientWeekView[]> {
  const { weekStart, filter } = options;
  const orgScope = filter.organization_id ? { organization_id: filter.organization_id } : {};

  const patients = await repos.patients.list(filter);
  if (patients.length === 0) return [];

  const locationIds = [...new Set(patients.flatMap((p) => (p.location_id ? [p.location_id] : [])))];
  const [programs, locations, tiers, facts, hoursUsed] = await Promise.all([
    repos.programs.list(orgScope),
    repos.locations.list(orgScope),
    repos.riskTiers.list({ ...orgScope, status: 'active' }),
    repos.attendance.weekFacts(weekStart, patients),
    repos.attendance.locationHoursUsed(weekStart, locationIds),
  ]);

  const programById = byId(programs, (p) => p.program_id);
  const locationById = byId(locations, (l) => l.location_id);
  const tiersByOrg = tiersByOrganization(tiers);

  return patients.map((patient) =>
    buildWeekView(
      patient,
      patient.program_id ? programById.get(patient.program_id) ?? null : null,
      patient.location_id ? locationById.get(patient.location_id) ?? null : null,
      tiersByOrg.get(patient.organization_id) ?? [],
      facts.get(patient.patient_id) ?? NO_ATTENDANCE,
      weekStart,
      patient.location_id ? hoursUsed.get(patient.location_id) ?? 0 : 0,
    ),
  );
}

/** Classified view of one patient for one week. */
export async function loadPatientWeekView(
  repos: Repositories,
  patient: Patient,
  weekStart: string,
): Promise<PatientWeekView> {
  const [program, location, tiers, facts, hoursUsed] = await Promise.all([
    patient.program_id ? repos.programs.findById(patient.program_id) : Promise.resolve(null),
    patient.location_id ? repos.locations.findById(patient.location_id) : Promise.resolve(null),
    repos.riskTiers.list({ organization_id: patient.organization_id, status: 'active' }),
    repos.attendance.weekFacts(weekStart, [patient]),
    repos.attendance.locationHoursUsed(weekStart, patient.location_id ? [patient.location_id] : []),
  ]);
  return buildWeekView(
    patient,
    program,
    location,
    tiers,
    facts.get(patient.patient_id) ?? NO_ATTENDANCE,
    weekStart,
    patient.location_id ? hoursUsed.get(patient.location_id) ?? 0 : 0,
  );
}

// ---------------------------------------------------------------------------
// Ordering & selection
// ---------------------------------------------------------------------------

/** Assigned first, then highest risk, then name. */
export function compareByRisk(a: PatientWeekView, b: PatientWeekView): number {
  if (a.assignment_status !== b.assignment_status) {
    return a.assignment_status === 'assigned' ? -1 : 1;
  }
  if (a.risk_score !== b.risk_score) return b.risk_score - a.risk_score;
  return a.full_name.localeCompare(b.full_name);
}

/** Patients needing follow-up: at risk, non-compliant, auto-flagged or unassigned. */
export function isHighRisk(view: PatientWeekView): boolean {
  return (
    view.compliance_status === 'at_risk' ||
    view.compliance_status === 'non_compliant' ||
    view.needs_followup ||
    view.assignment_status === 'pending'
  );
}

export interface EngagementSummary {
  week_start_date: string;
  total_patients: number;
  assigned_patients: number;
  pending_patients: number;
  by_engagement_category: Record<EngagementCategory, number>;
  by_compliance_status: Record<ComplianceStatus, number>;
  needs_followup: number;
  average_completion_percentage: number;
  total_hours_this_week: number;
  total_sessions_this_week: number;
}

export function summarise(views: PatientWeekView[], weekStart: string): EngagementSummary {
  const byEngagement: Record<EngagementCategory, number> = { engaged: 0, partial: 0, unengaged: 0, unassigned: 0 };
  const byCompliance: Record<ComplianceStatus, number> = { compliant: 0, at_risk: 0, non_compliant: 0, unassigned: 0 };
  let assigned = 0;
  let followup = 0;
  let hours = 0;
  let sessions = 0;
  let completionSum = 0;

  for (const v of views) {
    byEngagement[v.engagement_category] += 1;
    byCompliance[v.compliance_status] += 1;
    if (v.assignment_status === 'assigned') {
      assigned += 1;
      completionSum += v.completion_percentage;
    }
    if (v.needs_followup) followup += 1;
    hours += v.hours_attended;
    sessions += v.sessions_attended;
  }

  return {
    week_start_date: weekStart,
    total_patients: views.length,
    assigned_patients: assigned,
    pending_patients: views.length - assigned,
    by_engagement_category: byEngagement,
    by_compliance_status: byCompliance,
    needs_followup: followup,
    average_completion_percentage: assigned === 0 ? 0 : Math.round((completionSum / assigned) * 10) / 10,
    total_hours_this_week: Math.round(hours * 100) / 100,
    total_sessions_this_week: sessions,
  };
}
