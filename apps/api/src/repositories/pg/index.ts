// =============================================================================
// Attendwell API: PostgreSQL-backed DataStore
// =============================================================================

import {
  closeDb,
  withoutTenantContext,
  withTenantContext,
  type Sql,
  type TransactionSql,
} from '@attendwell/db';
import type { DataStore, Repositories } from '../types.js';
import { pgAttendance } from './attendance.js';
import { pgAudit } from './audit.js';
import { pgImports } from './imports.js';
import { pgLocations } from './locations.js';
import { pgPatients } from './patients.js';
import { pgPrograms } from './programs.js';
import { pgRiskTiers } from './riskTiers.js';
import { pgOrganizations, pgUsers } from './users.js';
import { pgWeeklyMetrics } from './weeklyMetrics.js';

function repositoriesFor(tx: TransactionSql): Repositories {
  return {
    users: pgUsers(tx),
    organizations: pgOrganizations(tx),
    patients: pgPatients(tx),
    programs: pgPrograms(tx),
    locations: pgLocations(tx),
    riskTiers: pgRiskTiers(tx),
    weeklyMetrics: pgWeeklyMetrics(tx),
    attendance: pgAttendance(tx),
    imports: pgImports(tx),
    audit: pgAudit(tx),
  };
}

export function createPgStore(sql: Sql): DataStore {
  return {
    withTenant(ctx, fn) {
      return withTenantContext(sql, ctx, (tx) => fn(repositoriesFor(tx)));
    },
    withSystem(fn) {
      return withoutTenantContext(sql, (tx) => fn(repositoriesFor(tx)));
    },
    async ping() {
      await sql`SELECT 1`;
    },
    close() {
      return closeDb(sql);
    },
  };
}
