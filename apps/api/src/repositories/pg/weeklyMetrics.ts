import type { TransactionSql } from '@attendwell/db';
import type { WeeklyMetric } from '@attendwell/shared';
import type { WeeklyMetricInput, WeeklyMetricRepository } from '../types.js';

const METRIC_COLUMNS = [
  'metric_id', 'patient_id', 'organization_id', 'week_start_date',
  'hours_attended', 'hours_required', 'hours_remaining_needed',
  'sessions_attended', 'sessions_missed',
  'total_clinic_hours_available', 'clinic_hours_remaining',
  'risk_score', 'risk_tier_id', 'compliance_status', 'needs_followup',
  'calculated_at', 'calculation_source',
];

export function pgWeeklyMetrics(tx: TransactionSql): WeeklyMetricRepository {
  const columns = tx(METRIC_COLUMNS);

  return {
    async upsert(input: WeeklyMetricInput) {
      const [row] = await tx<WeeklyMetric[]>`
        INSERT INTO patient_weekly_metrics ${tx(input)}
        ON CONFLICT (patient_id, week_start_date) DO UPDATE SET
          organization_id              = EXCLUDED.organization_id,
          hours_attended               = EXCLUDED.hours_attended,
          hours_required               = EXCLUDED.hours_required,
          hours_remaining_needed       = EXCLUDED.hours_remaining_needed,
          sessions_attended            = EXCLUDED.sessions_attended,
          sessions_missed              = EXCLUDED.sessions_missed,
          total_clinic_hours_available = EXCLUDED.total_clinic_hours_available,
          clinic_hours_remaining       = EXCLUDED.clinic_hours_remaining,
          risk_score                   = EXCLUDED.risk_score,
          risk_tier_id                 = EXCLUDED.risk_tier_id,
          compliance_status            = EXCLUDED.compliance_status,
          needs_followup               = EXCLUDED.needs_followup,
          calculation_source           = EXCLUDED.calculation_source,
          calculated_at                = NOW()
        RETURNING ${columns}
      `;
      if (!row) throw new Error('Weekly metric upsert returned no row');
      return row;
    },

    async listForWeek(weekStart, organizationId) {
      return tx<WeeklyMetric[]>`
        SELECT ${columns} FROM patient_weekly_metrics
        WHERE week_start_date = ${weekStart}::DATE
          AND (${organizationId ?? null}::UUID IS NULL OR organization_id = ${organizationId ?? null})
        ORDER BY risk_score DESC
      `;
    },
  };
}
