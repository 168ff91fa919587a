import type { TransactionSql } from '@attendwell/db';
import { addDays, type AttendanceFacts } from '@attendwell/shared';
import type { AttendanceRepository } from '../types.js';

interface FactRow {
  organization_id: string;
  mr: string;
  minutes_attended: number;
  sessions_attended: number;
  sessions_missed: number;
}

interface LocationUsageRow {
  location_id: string;
  minutes_used: number;
}

const toHours = (minutes: number) => Math.round((minutes / 60) * 100) / 100;

const key = (organizationId: string, mr: string) => `${organizationId}\u0000${mr}`;

export function pgAttendance(tx: TransactionSql): AttendanceRepository {
  return {
    async weekFacts(weekStart, patients) {
      const facts = new Map<string, AttendanceFacts>();
      if (patients.length === 0) return facts;

      const orgIds = [...new Set(patients.map((p) => p.organization_id))];
      const mrs = [...new Set(patients.map((p) => p.mr))];
      const weekEnd = addDays(weekStart, 7);

      const rows = await tx<FactRow[]>`
        SELECT
          organization_id,
          mr,
          COALESCE(SUM(duration) FILTER (WHERE attended = 1), 0)::NUMERIC AS minutes_attended,
          COUNT(*) FILTER (WHERE attended = 1)::INT AS sessions_attended,
          COUNT(*) FILTER (WHERE absent = 1)::INT AS sessions_missed
        FROM services_raw_data
        WHERE status = 'processed'
          AND service_type = 'session'
          AND organization_id = ANY(${tx.array(orgIds)}::UUID[])
          AND mr = ANY(${tx.array(mrs)}::TEXT[])
          AND started >= ${weekStart}::DATE AT TIME ZONE 'UTC'
          AND started <  ${weekEnd}::DATE AT TIME ZONE 'UTC'
        GROUP BY organization_id, mr
      `;

      const byKey = new Map(rows.map((row) => [key(row.organization_id, row.mr), row]));
      for (const patient of patients) {
        const row = byKey.get(key(patient.organization_id, patient.mr));
        if (!row) continue;
        facts.set(patient.patient_id, {
          hours_attended: toHours(row.minutes_attended),
          sessions_attended: row.sessions_attended,
          sessions_missed: row.sessions_missed,
        });
      }
      return facts;
    },

    async locationHoursUsed(weekStart, locationIds) {
      const used = new Map<string, number>();
      if (locationIds.length === 0) return used;
      const weekEnd = addDays(weekStart, 7);

      const rows = await tx<LocationUsageRow[]>`
        SELECT location_id, COALESCE(SUM(duration), 0)::NUMERIC AS minutes_used
        FROM (
          SELECT DISTINCT ON (location_id, session_name, started) location_id, duration
          FROM services_raw_data
          WHERE status = 'processed'
            AND service_type = 'session'
            AND attended = 1
            AND location_id = ANY(${tx.array([...locationIds])}::UUID[])
            AND started >= ${weekStart}::DATE AT TIME ZONE 'UTC'
            AND started <  ${weekEnd}::DATE AT TIME ZONE 'UTC'
          ORDER BY location_id, session_name, started, duration DESC
        ) sessions
        GROUP BY location_id
      `;

      for (const row of rows) used.set(row.location_id, toHours(row.minutes_used));
      return used;
    },
  };
}
