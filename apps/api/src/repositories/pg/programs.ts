import type { TransactionSql } from '@attendwell/db';
import type { Program } from '@attendwell/shared';
import type { NewProgram, ProgramPatch, ProgramRepository } from '../types.js';
import { translateUnique } from './errors.js';

const PROGRAM_COLUMNS = [
  'program_id', 'organization_id', 'name', 'description', 'level_of_care',
  'hours_per_week', 'status', 'created_at', 'updated_at',
];

export function pgPrograms(tx: TransactionSql): ProgramRepository {
  const columns = tx(PROGRAM_COLUMNS);

  return {
    async findById(programId) {
      const [row] = await tx<Program[]>`SELECT ${columns} FROM programs WHERE program_id = ${programId}`;
      return row ?? null;
    },

    async list(filter) {
      return tx<Program[]>`
        SELECT ${columns} FROM programs
        WHERE (${filter.organization_id ?? null}::UUID IS NULL OR organization_id = ${filter.organization_id ?? null})
          AND (${filter.status ?? null}::TEXT IS NULL OR status = ${filter.status ?? null})
        ORDER BY name
      `;
    },

    async create(input: NewProgram) {
      const [row] = await translateUnique(tx<Program[]>`
        INSERT INTO programs (organization_id, name, description, level_of_care, hours_per_week)
        VALUES (
          ${input.organization_id}, ${input.name}, ${input.description},
          ${input.level_of_care}, ${input.hours_per_week}
        )
        RETURNING ${columns}
      `);
      if (!row) throw new Error('Program insert returned no row');
      return row;
    },

    async update(programId, patch: ProgramPatch) {
      const [row] = await translateUnique(tx<Program[]>`
        UPDATE programs SET
          name           = COALESCE(${patch.name ?? null}, name),
          description    = CASE WHEN ${patch.description !== undefined} THEN ${patch.description ?? null} ELSE description END,
          level_of_care  = CASE WHEN ${patch.level_of_care !== undefined} THEN ${patch.level_of_care ?? null} ELSE level_of_care END,
          hours_per_week = COALESCE(${patch.hours_per_week ?? null}::NUMERIC, hours_per_week),
          status         = COALESCE(${patch.status ?? null}, status),
          updated_at     = NOW()
        WHERE program_id = ${programId}
        RETURNING ${columns}
      `);
      return row ?? null;
    },
  };
}
