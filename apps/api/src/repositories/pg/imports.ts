import type { TransactionSql } from '@attendwell/db';
import type { ImportRecord, ImportStatus } from '@attendwell/shared';
import type { ImportGroup, ImportRepository, ImportSummary } from '../types.js';

const RECORD_COLUMNS = [
  'record_id', 'organization_id', 'location_id', 'service_type', 'file_name', 'mr', 'full_name',
  'session_name', 'provider', 'started', 'ended', 'duration', 'attended', 'absent', 'status',
  'error_message', 'imported_at', 'processed_at',
];

const RECENT_FILES_PER_GROUP = 5;
const RECENT_ERRORS_PER_GROUP = 3;

interface GroupRow {
  organization_id: string;
  location_id: string | null;
  status: ImportStatus;
  count: number;
  latest_import: Date | null;
}

const groupKey = (organizationId: string, locationId: string | null) => `${organizationId}:${locationId ?? ''}`;

export function pgImports(tx: TransactionSql): ImportRepository {
  const columns = tx(RECORD_COLUMNS);

  return {
    async summary() {
      const [row] = await tx<ImportSummary[]>`
        SELECT
          COUNT(*)::INT                                         AS total_records,
          COUNT(*) FILTER (WHERE status = 'pending')::INT       AS pending,
          COUNT(*) FILTER (WHERE status = 'processing')::INT    AS processing,
          COUNT(*) FILTER (WHERE status = 'processed')::INT     AS processed,
          COUNT(*) FILTER (WHERE status = 'error')::INT         AS error,
          COUNT(*) FILTER (WHERE status = 'skipped')::INT       AS skipped,
          MAX(imported_at)                                      AS latest_import
        FROM services_raw_data
      `;
      return row ?? {
        total_records: 0, pending: 0, processing: 0, processed: 0, error: 0, skipped: 0, latest_import: null,
      };
    },

    async recentFiles(limit) {
      const rows = await tx<{ file_name: string }[]>`
        SELECT file_name FROM services_raw_data
        WHERE file_name IS NOT NULL
        GROUP BY file_name
        ORDER BY MAX(imported_at) DESC
        LIMIT ${limit}
      `;
      return rows.map((r) => r.file_name);
    },

    async files(limit) {
      return tx<{ file_name: string; record_count: number; latest_import: Date }[]>`
        SELECT file_name, COUNT(*)::INT AS record_count, MAX(imported_at) AS latest_import
        FROM services_raw_data
        WHERE file_name IS NOT NULL
        GROUP BY file_name
        ORDER BY latest_import DESC
        LIMIT ${limit}
      `;
    },

    async overview() {
      const counts = await tx<GroupRow[]>`
        SELECT organization_id, location_id, status, COUNT(*)::INT AS count, MAX(imported_at) AS latest_import
        FROM services_raw_data
        GROUP BY organization_id, location_id, status
      `;
      const files = await tx<{ organization_id: string; location_id: string | null; file_name: string }[]>`
        SELECT organization_id, location_id, file_name FROM (
          SELECT organization_id, location_id, file_name,
                 ROW_NUMBER() OVER (PARTITION BY organization_id, location_id ORDER BY MAX(imported_at) DESC) AS rn
          FROM services_raw_data
          WHERE file_name IS NOT NULL
          GROUP BY organization_id, location_id, file_name
        ) ranked
        WHERE rn <= ${RECENT_FILES_PER_GROUP}
        ORDER BY rn
      `;
      const errors = await tx<{ organization_id: string; location_id: string | null; error_message: string; occurred_at: Date }[]>`
        SELECT organization_id, location_id, error_message, occurred_at FROM (
          SELECT organization_id, location_id, error_message, MAX(imported_at) AS occurred_at,
                 ROW_NUMBER() OVER (PARTITION BY organization_id, location_id ORDER BY MAX(imported_at) DESC) AS rn
          FROM services_raw_data
          WHERE status = 'error' AND error_message IS NOT NULL
          GROUP BY organization_id, location_id, error_message
        ) ranked
        WHERE rn <= ${RECENT_ERRORS_PER_GROUP}
        ORDER BY rn
      `;

      const groups = new Map<string, ImportGroup>();
      for (const row of counts) {
        const k = groupKey(row.organization_id, row.location_id);
        const group = groups.get(k) ?? {
          organization_id: row.organization_id,
          location_id: row.location_id,
          total_records: 0,
          status_breakdown: {},
          latest_import: null,
          recent_files: [],
          processing_errors: [],
        };
        group.total_records += row.count;
        group.status_breakdown[row.status] = row.count;
        if (row.latest_import && (!group.latest_import || row.latest_import > group.latest_import)) {
          group.latest_import = row.latest_import;
        }
        groups.set(k, group);
      }
      for (const row of files) {
        groups.get(groupKey(row.organization_id, row.location_id))?.recent_files.push(row.file_name);
      }
      for (const row of errors) {
        groups.get(groupKey(row.organization_id, row.location_id))?.processing_errors.push({
          error_message: row.error_message,
          occurred_at: row.occurred_at,
        });
      }
      return [...groups.values()];
    },

    async list(query) {
      const filter = tx`
        WHERE (${query.status ?? null}::TEXT IS NULL OR status = ${query.status ?? null})
          AND (${query.service_type ?? null}::TEXT IS NULL OR service_type = ${query.service_type ?? null})
          AND (${query.file_name ?? null}::TEXT IS NULL OR file_name = ${query.file_name ?? null})
      `;
      const [count] = await tx<{ total: number }[]>`SELECT COUNT(*)::INT AS total FROM services_raw_data ${filter}`;
      const items = await tx<ImportRecord[]>`
        SELECT ${columns} FROM services_raw_data ${filter}
        ORDER BY imported_at DESC, record_id
        LIMIT ${query.limit} OFFSET ${query.offset}
      `;
      return { items, total: count?.total ?? 0 };
    },

    async findById(recordId) {
      const [row] = await tx<ImportRecord[]>`SELECT ${columns} FROM services_raw_data WHERE record_id = ${recordId}`;
      return row ?? null;
    },

    async resetToPending(recordId) {
      const [row] = await tx<ImportRecord[]>`
        UPDATE services_raw_data
        SET status = 'pending', error_message = NULL, processed_at = NULL, updated_at = NOW()
        WHERE record_id = ${recordId} AND status IN ('error', 'skipped')
        RETURNING ${columns}
      `;
      return row ?? null;
    },

    async errors(limit) {
      return tx<ImportRecord[]>`
        SELECT ${columns} FROM services_raw_data
        WHERE status = 'error'
        ORDER BY imported_at DESC
        LIMIT ${limit}
      `;
    },
  };
}
