// =============================================================================
// Attendwell API: Weekly metrics calculation
//
// Classifies every active patient of one organization for one week and
// stores the result per (patient, week). Each patient is persisted in its own
// transaction: one failed write is counted and logged, the rest still run.
// Re-running a week overwrites the stored rows.
// =============================================================================

import type { FastifyBaseLogger } from 'fastify';
import type { TenantContext } from '@attendwell/db';
import { weekStartOf, type CalculationSource } from '@attendwell/shared';
import type { DataStore, WeeklyMetricInput } from '../repositories/types.js';
import { loadWeekView, type PatientWeekView } from './engagement.js';

export interface WeeklyJobDeps {
  store: DataStore;
  log: Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>;
  now?: () => Date;
}

export interface WeeklyJobResult {
  calculated_count: number;
  skipped_count: number;
  error_count: number;
  week_calculated: string;
}

export function toMetricInput(view: PatientWeekView, source: CalculationSource): WeeklyMetricInput {
  return {
    patient_id: view.patient_id,
    organization_id: view.organization_id,
    week_start_date: view.week_start_date,
    hours_attended: view.hours_attended,
    hours_required: view.hours_required,
    hours_remaining_needed: view.hours_remaining_needed,
    sessions_attended: view.sessions_attended,
    sessions_missed: view.sessions_missed,
    total_clinic_hours_available: view.clinic_hours_total,
    clinic_hours_remaining: view.clinic_hours_remaining,
    risk_score: view.risk_score,
    risk_tier_id: view.tier_id,
    compliance_status: view.compliance_status,
    needs_followup: view.needs_followup,
    calculation_source: source,
  };
}

export async function calculateWeeklyMetrics(
  deps: WeeklyJobDeps,
  ctx: TenantContext,
  tenantId: string,
  weekStartDate: string,
  source: CalculationSource = 'manual',
): Promise<WeeklyJobResult> {
  const weekStart = weekStartOf(weekStartDate);

  const views = await deps.store.withTenant(ctx, (repos) =>
    loadWeekView(repos, {
      weekStart,
      filter: { organization_id: tenantId, statuses: ['active'] },
    }),
  );

  const result: WeeklyJobResult = {
    calculated_count: 0,
    skipped_count: 0,
    error_count: 0,
    week_calculated: weekStart,
  };

  for (const view of views) {
    if (view.compliance_status === 'unassigned') {
      result.skipped_count += 1;
      continue;
    }
    try {
      await deps.store.withTenant(ctx, (repos) => repos.weeklyMetrics.upsert(toMetricInput(view, source)));
      result.calculated_count += 1;
    } catch (err) {
      result.error_count += 1;
      deps.log.error(
        { err, patient_id: view.patient_id, organization_id: tenantId, week_start_date: weekStart },
        'Weekly metric calculation failed for patient',
      );
    }
  }

  deps.log.info({ organization_id: tenantId, ...result }, 'Weekly metrics calculated');
  return result;
}
