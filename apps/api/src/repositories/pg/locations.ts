import type { TransactionSql } from '@attendwell/db';
import { DAYS_OF_WEEK, type Location } from '@attendwell/shared';
import type { LocationPatch, LocationRepository, NewLocation } from '../types.js';
import { translateUnique } from './errors.js';

const SCHEDULE_COLUMNS = DAYS_OF_WEEK.flatMap((day) => [`${day}_open`, `${day}_close`]);

const LOCATION_COLUMNS = [
  'location_id', 'organization_id', 'name', 'timezone',
  ...SCHEDULE_COLUMNS,
  'created_at', 'updated_at',
];

/** Only the keys the patch actually carries; `null` is kept so a day can be closed. */
function changedColumns(patch: LocationPatch): Record<string, string | null> {
  const changes: Record<string, string | null> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) changes[key] = value;
  }
  return changes;
}

export function pgLocations(tx: TransactionSql): LocationRepository {
  const columns = tx(LOCATION_COLUMNS);

  return {
    async findById(locationId) {
      const [row] = await tx<Location[]>`SELECT ${columns} FROM locations WHERE location_id = ${locationId}`;
      return row ?? null;
    },

    async list(filter) {
      return tx<Location[]>`
        SELECT ${columns} FROM locations
        WHERE (${filter.organization_id ?? null}::UUID IS NULL OR organization_id = ${filter.organization_id ?? null})
        ORDER BY name
      `;
    },

    async create(input: NewLocation) {
      const [row] = await translateUnique(tx<Location[]>`
        INSERT INTO locations ${tx(input)}
        RETURNING ${columns}
      `);
      if (!row) throw new Error('Location insert returned no row');
      return row;
    },

    async update(locationId, patch) {
      const changes = changedColumns(patch);
      if (Object.keys(changes).length === 0) {
        const [row] = await tx<Location[]>`SELECT ${columns} FROM locations WHERE location_id = ${locationId}`;
        return row ?? null;
      }
      const [row] = await translateUnique(tx<Location[]>`
        UPDATE locations SET ${tx(changes)}, updated_at = NOW()
        WHERE location_id = ${locationId}
        RETURNING ${columns}
      `);
      return row ?? null;
    },

    async delete(locationId) {
      // Active patients block deletion upstream; anyone else still pointing here is unassigned
      await tx`
        UPDATE patients SET location_id = NULL, assignment_status = 'pending', updated_at = NOW()
        WHERE location_id = ${locationId}
      `;
      const rows = await tx`DELETE FROM locations WHERE location_id = ${locationId}`;
      return rows.count > 0;
    },
  };
}
