import type { TransactionSql } from '@attendwell/db';
import type { AuditActionType, AuditLogEntry, AuditResourceType, NewAuditLogEntry } from '@attendwell/shared';
import type { AuditRepository, AuditSummary } from '../types.js';

const AUDIT_COLUMNS = [
  'log_id', 'timestamp', 'user_id', 'user_email', 'user_role', 'organization_id', 'session_id',
  'method', 'endpoint', 'full_url', 'user_agent', 'ip_address', 'status_code', 'response_time_ms',
  'action_type', 'resource_type', 'resource_id', 'phi_accessed', 'patient_id', 'data_exported',
  'request_body_hash', 'query_parameters',
];

const TOP_ENDPOINTS = 10;

export function pgAudit(tx: TransactionSql): AuditRepository {
  const columns = tx(AUDIT_COLUMNS);

  return {
    async insert(entry: NewAuditLogEntry) {
      const queryParameters = entry.query_parameters ? tx.json(entry.query_parameters) : null;
      await tx`
        INSERT INTO audit_logs (
          user_id, user_email, user_role, organization_id, session_id, method, endpoint, full_url,
          user_agent, ip_address, status_code, response_time_ms, action_type, resource_type,
          resource_id, phi_accessed, patient_id, data_exported, request_body_hash, query_parameters
        ) VALUES (
          ${entry.user_id}, ${entry.user_email}, ${entry.user_role}, ${entry.organization_id},
          ${entry.session_id}, ${entry.method}, ${entry.endpoint}, ${entry.full_url},
          ${entry.user_agent}, ${entry.ip_address}, ${entry.status_code}, ${entry.response_time_ms},
          ${entry.action_type}, ${entry.resource_type}, ${entry.resource_id}, ${entry.phi_accessed},
          ${entry.patient_id}, ${entry.data_exported}, ${entry.request_body_hash}, ${queryParameters}
        )
      `;
    },

    async list(query) {
      const filter = tx`
        WHERE (${query.user_id ?? null}::UUID IS NULL OR user_id = ${query.user_id ?? null})
          AND (${query.user_email ?? null}::TEXT IS NULL OR user_email ILIKE '%' || ${query.user_email ?? null} || '%')
          AND (${query.action_type ?? null}::TEXT IS NULL OR action_type = ${query.action_type ?? null})
          AND (${query.resource_type ?? null}::TEXT IS NULL OR resource_type = ${query.resource_type ?? null})
          AND (${query.phi_accessed ?? null}::BOOLEAN IS NULL OR phi_accessed = ${query.phi_accessed ?? null})
          AND (${query.start_date ?? null}::TIMESTAMPTZ IS NULL OR timestamp >= ${query.start_date ?? null})
          AND (${query.end_date ?? null}::TIMESTAMPTZ IS NULL OR timestamp <= ${query.end_date ?? null})
          AND (${query.ip_address ?? null}::TEXT IS NULL OR ip_address = ${query.ip_address ?? null})
      `;
      const [count] = await tx<{ total: number }[]>`SELECT COUNT(*)::INT AS total FROM audit_logs ${filter}`;
      const items = await tx<AuditLogEntry[]>`
        SELECT ${columns} FROM audit_logs ${filter}
        ORDER BY timestamp DESC
        LIMIT ${query.limit} OFFSET ${query.offset}
      `;
      return { items, total: count?.total ?? 0 };
    },

    async listPhiAccess(query) {
      return tx<AuditLogEntry[]>`
        SELECT ${columns} FROM audit_logs
        WHERE phi_accessed = TRUE
          AND (${query.patient_id ?? null}::TEXT IS NULL OR patient_id = ${query.patient_id ?? null})
          AND (${query.start_date ?? null}::TIMESTAMPTZ IS NULL OR timestamp >= ${query.start_date ?? null})
          AND (${query.end_date ?? null}::TIMESTAMPTZ IS NULL OR timestamp <= ${query.end_date ?? null})
        ORDER BY timestamp DESC
        LIMIT ${query.limit}
      `;
    },

    async listFailedAccess(since) {
      return tx<AuditLogEntry[]>`
        SELECT ${columns} FROM audit_logs
        WHERE status_code IN (401, 403) AND timestamp >= ${since}
        ORDER BY timestamp DESC
      `;
    },

    async summary(since, windowHours): Promise<AuditSummary> {
      const [totals] = await tx<Omit<AuditSummary, 'window_hours' | 'by_action' | 'by_resource' | 'top_endpoints'>[]>`
        SELECT
          COUNT(*)::INT                                           AS total_requests,
          COUNT(DISTINCT user_id)::INT                            AS unique_users,
          COUNT(*) FILTER (WHERE phi_accessed)::INT               AS phi_access_count,
          COUNT(*) FILTER (WHERE status_code >= 400)::INT         AS failed_requests,
          COUNT(*) FILTER (WHERE action_type = 'ACCESS_DENIED')::INT AS access_denied_count,
          COUNT(*) FILTER (WHERE data_exported)::INT              AS export_count
        FROM audit_logs
        WHERE timestamp >= ${since}
      `;
      const actions = await tx<{ action_type: AuditActionType; count: number }[]>`
        SELECT action_type, COUNT(*)::INT AS count FROM audit_logs
        WHERE timestamp >= ${since}
        GROUP BY action_type
      `;
      const resources = await tx<{ resource_type: AuditResourceType; count: number }[]>`
        SELECT resource_type, COUNT(*)::INT AS count FROM audit_logs
        WHERE timestamp >= ${since}
        GROUP BY resource_type
      `;
      const endpoints = await tx<{ endpoint: string; count: number }[]>`
        SELECT endpoint, COUNT(*)::INT AS count FROM audit_logs
        WHERE timestamp >= ${since}
        GROUP BY endpoint
        ORDER BY count DESC, endpoint
        LIMIT ${TOP_ENDPOINTS}
      `;

      const byAction: AuditSummary['by_action'] = {};
      for (const row of actions) byAction[row.action_type] = row.count;
      const byResource: AuditSummary['by_resource'] = {};
      for (const row of resources) byResource[row.resource_type] = row.count;

      return {
        window_hours: windowHours,
        total_requests: totals?.total_requests ?? 0,
        unique_users: totals?.unique_users ?? 0,
        phi_access_count: totals?.phi_access_count ?? 0,
        failed_requests: totals?.failed_requests ?? 0,
        access_denied_count: totals?.access_denied_count ?? 0,
        export_count: totals?.export_count ?? 0,
        by_action: byAction,
        by_resource: byResource,
        top_endpoints: endpoints.map((e) => ({ endpoint: e.endpoint, count: e.count })),
      };
    },

    async deleteOlderThan(cutoff) {
      const rows = await tx`DELETE FROM audit_logs WHERE timestamp < ${cutoff}`;
      return rows.count;
    },
  };
}
