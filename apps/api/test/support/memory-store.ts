// In-process DataStore for route and service tests. Mirrors the postgres
// repositories query for query, including the row-level security policies:
//   withSystem                    tenant-owned tables are empty
//   withTenant(system_admin)      every tenant
//   withTenant(anyone else)       rows whose organization_id matches ctx.orgId
// There is no rollback; a throwing callback keeps the writes it made.

import { randomUUID } from 'crypto';
import {
  DAYS_OF_WEEK,
  ROLES,
  addDays,
  type AttendanceFacts,
  type AuditLogEntry,
  type DayOfWeek,
  type ImportRecord,
  type Location,
  type Organization,
  type Patient,
  type Program,
  type RiskTier,
  type User,
  type WeeklyMetric,
  type WeeklySchedule,
} from '@attendwell/shared';
import type { TenantContext } from '@attendwell/db';
import {
  UniqueViolationError,
  type AuditSummary,
  type DataStore,
  type ImportGroup,
  type ImportStatusCounts,
  type Repositories,
  type UserCredentials,
} from '../../src/repositories/types.js';

export interface StoredUser extends User {
  password_hash: string;
}

export interface MemoryTables {
  organizations: Organization[];
  users: StoredUser[];
  programs: Program[];
  locations: Location[];
  riskTiers: RiskTier[];
  patients: Patient[];
  weeklyMetrics: WeeklyMetric[];
  imports: ImportRecord[];
  audit: AuditLogEntry[];
}

type Scope = TenantContext | null;

const openKey = (day: DayOfWeek) => `${day}_open` as const;
const closeKey = (day: DayOfWeek) => `${day}_close` as const;

export function closedWeek(): WeeklySchedule {
  return {
    monday_open: null,
    monday_close: null,
    tuesday_open: null,
    tuesday_close: null,
    wednesday_open: null,
    wednesday_close: null,
    thursday_open: null,
    thursday_close: null,
    friday_open: null,
    friday_close: null,
    saturday_open: null,
    saturday_close: null,
    sunday_open: null,
    sunday_close: null,
  };
}

export class RowSecurityError extends Error {
  constructor(table: string) {
    super(`new row violates row-level security policy for table "${table}"`);
    this.name = 'RowSecurityError';
  }
}

const byName = <T extends { name: string }>(a: T, b: T) => a.name.localeCompare(b.name);

export class MemoryStore implements DataStore {
  readonly tables: MemoryTables = {
    organizations: [],
    users: [],
    programs: [],
    locations: [],
    riskTiers: [],
    patients: [],
    weeklyMetrics: [],
    imports: [],
    audit: [],
  };

  /** Every scope opened, in order; null for withSystem. */
  readonly scopes: Scope[] = [];

  failAuditWrites = false;
  readonly failMetricWritesFor = new Set<string>();
  now: () => Date = () => new Date();

  async withTenant<T>(ctx: TenantContext, fn: (repos: Repositories) => Promise<T>): Promise<T> {
    if (!ctx.role) {
      throw new Error('Tenant context requires a role');
    }
    const scope = { role: ctx.role, orgId: ctx.orgId };
    this.scopes.push(scope);
    // Yield so concurrent requests interleave the way pooled connections do
    await new Promise((resolve) => setImmediate(resolve));
    return fn(this.repositories(scope));
  }

  async withSystem<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    this.scopes.push(null);
    await new Promise((resolve) => setImmediate(resolve));
    return fn(this.repositories(null));
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  // -------------------------------------------------------------------------
  // Seeding
  // -------------------------------------------------------------------------

  addOrganization(overrides: Partial<Organization> = {}): Organization {
    const at = this.now();
    const row: Organization = {
      organization_id: randomUUID(),
      name: 'Org',
      status: 'active',
      created_at: at,
      updated_at: at,
      ...overrides,
    };
    this.tables.organizations.push(row);
    return row;
  }

  addUser(overrides: Partial<StoredUser> & Pick<StoredUser, 'email' | 'role'>): StoredUser {
    const at = this.now();
    const row: StoredUser = {
      user_id: randomUUID(),
      username: overrides.email.split('@')[0] ?? overrides.email,
      organization_id: null,
      location_id: null,
      is_active: true,
      password_hash: 'hashed:test-password',
      created_at: at,
      updated_at: at,
      last_login: null,
      ...overrides,
    };
    this.tables.users.push(row);
    return row;
  }

  addProgram(overrides: Partial<Program> & Pick<Program, 'organization_id'>): Program {
    const at = this.now();
    const row: Program = {
      program_id: randomUUID(),
      name: 'Program',
      description: null,
      level_of_care: null,
      hours_per_week: 20,
      status: 'active',
      created_at: at,
      updated_at: at,
      ...overrides,
    };
    this.tables.programs.push(row);
    return row;
  }

  addLocation(overrides: Partial<Location> & Pick<Location, 'organization_id'>): Location {
    const at = this.now();
    const row: Location = {
      location_id: randomUUID(),
      name: 'Location',
      timezone: 'UTC',
      ...closedWeek(),
      created_at: at,
      updated_at: at,
      ...overrides,
    };
    this.tables.locations.push(row);
    return row;
  }

  addRiskTier(overrides: Partial<RiskTier> & Pick<RiskTier, 'organization_id' | 'tier_label'>): RiskTier {
    const at = this.now();
    const row: RiskTier = {
      tier_id: randomUUID(),
      tier_description: '',
      recommended_actions: '',
      risk_level_range_low: 0,
      risk_level_range_high: 100,
      color: '#999999',
      sort_order: 0,
      auto_flag_for_followup: false,
      status: 'active',
      created_at: at,
      updated_at: at,
      ...overrides,
    };
    this.tables.riskTiers.push(row);
    return row;
  }

  addPatient(overrides: Partial<Patient> & Pick<Patient, 'organization_id' | 'mr'>): Patient {
    const at = this.now();
    const row: Patient = {
      patient_id: randomUUID(),
      full_name: `Patient ${overrides.mr}`,
      phone: null,
      email: null,
      primary_therapist: null,
      admission_date: null,
      discharge_date: null,
      program_id: null,
      location_id: null,
      assignment_status: 'pending',
      status: 'active',
      created_at: at,
      updated_at: at,
      ...overrides,
    };
    this.tables.patients.push(row);
    return row;
  }

  addImport(overrides: Partial<ImportRecord> & Pick<ImportRecord, 'organization_id'>): ImportRecord {
    const row: ImportRecord = {
      record_id: randomUUID(),
      location_id: null,
      service_type: 'session',
      file_name: null,
      mr: null,
      full_name: null,
      session_name: null,
      provider: null,
      started: null,
      ended: null,
      duration: null,
      attended: null,
      absent: null,
      status: 'pending',
      error_message: null,
      imported_at: this.now(),
      processed_at: null,
      ...overrides,
    };
    this.tables.imports.push(row);
    return row;
  }

  addAuditEntry(overrides: Partial<AuditLogEntry> & Pick<AuditLogEntry, 'endpoint'>): AuditLogEntry {
    const row: AuditLogEntry = {
      log_id: randomUUID(),
      timestamp: this.now(),
      user_id: null,
      user_email: null,
      user_role: null,
      organization_id: null,
      session_id: null,
      method: 'GET',
      full_url: `http://localhost${overrides.endpoint}`,
      user_agent: null,
      ip_address: null,
      status_code: 200,
      response_time_ms: 1,
      action_type: 'READ',
      resource_type: 'SYSTEM',
      resource_id: null,
      phi_accessed: false,
      patient_id: null,
      data_exported: false,
      request_body_hash: null,
      query_parameters: null,
      ...overrides,
    };
    this.tables.audit.push(row);
    return row;
  }

  // -------------------------------------------------------------------------
  // Repositories
  // -------------------------------------------------------------------------

  private repositories(scope: Scope): Repositories {
    const t = this.tables;
    const now = () => this.now();

    const visible = (organizationId: string): boolean => {
      if (scope === null) return false;
      if (scope.role === ROLES.SUPERUSER) return true;
      return scope.orgId !== null && scope.orgId !== '' && scope.orgId === organizationId;
    };
    const checkWrite = (table: string, organizationId: string): void => {
      if (!visible(organizationId)) throw new RowSecurityError(table);
    };
    const rows = <R extends { organization_id: string }>(table: R[]): R[] =>
      table.filter((r) => visible(r.organization_id));

    const toPrincipal = (u: StoredUser): UserCredentials => ({
      user_id: u.user_id,
      username: u.username,
      email: u.email,
      role: u.role,
      organization_id: u.organization_id,
      location_id: u.location_id,
      is_active: u.is_active,
      password_hash: u.password_hash,
    });
    const toUser = (u: StoredUser): User => {
      const { password_hash: _omit, ...user } = u;
      return { ...user };
    };

    const auditSince = (since: Date) => t.audit.filter((e) => e.timestamp >= since);
    const newestFirst = (a: AuditLogEntry, b: AuditLogEntry) => b.timestamp.getTime() - a.timestamp.getTime();

    return {
      users: {
        async findActivePrincipalByEmail(email) {
          const user = t.users.find((u) => u.email === email && u.is_active);
          if (!user) return null;
          const { password_hash: _omit, ...principal } = toPrincipal(user);
          return principal;
        },
        async findCredentialsByEmail(email) {
          const user = t.users.find((u) => u.email === email);
          return user ? toPrincipal(user) : null;
        },
        async existsByEmailOrUsername(email, username) {
          return t.users.some((u) => u.email === email || u.username === username);
        },
        async recordLogin(userId, at) {
          const user = t.users.find((u) => u.user_id === userId);
          if (user) user.last_login = at;
        },
        async create(input) {
          if (t.users.some((u) => u.email === input.email)) throw new UniqueViolationError('users_email_key');
          if (t.users.some((u) => u.username === input.username)) throw new UniqueViolationError('users_username_key');
          const at = now();
          const row: StoredUser = {
            user_id: randomUUID(),
            ...input,
            is_active: true,
            created_at: at,
            updated_at: at,
            last_login: null,
          };
          t.users.push(row);
          return toUser(row);
        },
        async findById(userId) {
          const user = t.users.find((u) => u.user_id === userId);
          return user ? toUser(user) : null;
        },
        async list(organizationId) {
          return t.users
            .filter((u) => organizationId === null || u.organization_id === organizationId)
            .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
            .map(toUser);
        },
        async setActive(userId, isActive) {
          const user = t.users.find((u) => u.user_id === userId);
          if (!user) return null;
          user.is_active = isActive;
          user.updated_at = now();
          return toUser(user);
        },
      },

      organizations: {
        async findById(organizationId) {
          return t.organizations.find((o) => o.organization_id === organizationId) ?? null;
        },
        async listActive() {
          return t.organizations.filter((o) => o.status === 'active').sort(byName);
        },
      },

      patients: {
        async findById(patientId) {
          return rows(t.patients).find((p) => p.patient_id === patientId && p.status !== 'deleted') ?? null;
        },
        async list(filter) {
          const statuses = filter.statuses ?? ['active', 'inactive'];
          return rows(t.patients)
            .filter(
              (p) =>
                statuses.includes(p.status) &&
                (filter.organization_id === undefined || p.organization_id === filter.organization_id) &&
                (filter.assignment_status === undefined || p.assignment_status === filter.assignment_status) &&
                (filter.program_id === undefined || p.program_id === filter.program_id) &&
                (filter.location_id === undefined || p.location_id === filter.location_id),
            )
            .sort((a, b) => a.full_name.localeCompare(b.full_name) || a.mr.localeCompare(b.mr));
        },
        async create(input) {
          checkWrite('patients', input.organization_id);
          if (t.patients.some((p) => p.organization_id === input.organization_id && p.mr === input.mr)) {
            throw new UniqueViolationError('patients_mr_org_unique');
          }
          const at = now();
          const row: Patient = { patient_id: randomUUID(), ...input, created_at: at, updated_at: at };
          t.patients.push(row);
          return { ...row };
        },
        async update(patientId, patch) {
          const row = rows(t.patients).find((p) => p.patient_id === patientId && p.status !== 'deleted');
          if (!row) return null;
          const mr = patch.mr ?? row.mr;
          if (
            mr !== row.mr &&
            t.patients.some((p) => p.organization_id === row.organization_id && p.mr === mr)
          ) {
            throw new UniqueViolationError('patients_mr_org_unique');
          }
          Object.assign(row, {
            mr,
            full_name: patch.full_name ?? row.full_name,
            phone: patch.phone !== undefined ? patch.phone : row.phone,
            email: patch.email !== undefined ? patch.email : row.email,
            primary_therapist: patch.primary_therapist !== undefined ? patch.primary_therapist : row.primary_therapist,
            admission_date: patch.admission_date !== undefined ? patch.admission_date : row.admission_date,
            discharge_date: patch.discharge_date !== undefined ? patch.discharge_date : row.discharge_date,
            status: patch.status ?? row.status,
            program_id: patch.program_id !== undefined ? patch.program_id : row.program_id,
            location_id: patch.location_id !== undefined ? patch.location_id : row.location_id,
            assignment_status: patch.assignment_status,
            updated_at: now(),
          });
          return { ...row };
        },
        async softDelete(patientId) {
          const row = rows(t.patients).find((p) => p.patient_id === patientId && p.status !== 'deleted');
          if (!row) return false;
          row.status = 'deleted';
          row.updated_at = now();
          return true;
        },
        async countReferencingProgram(programId) {
          return rows(t.patients).filter((p) => p.program_id === programId && p.status !== 'deleted').length;
        },
        async countActiveAtLocation(locationId) {
          return rows(t.patients).filter((p) => p.location_id === locationId && p.status === 'active').length;
        },
      },

      programs: {
        async findById(programId) {
          return rows(t.programs).find((p) => p.program_id === programId) ?? null;
        },
        async list(filter) {
          return rows(t.programs)
            .filter(
              (p) =>
                (filter.organization_id === undefined || p.organization_id === filter.organization_id) &&
                (filter.status === undefined || p.status === filter.status),
            )
            .sort(byName);
        },
        async create(input) {
          checkWrite('programs', input.organization_id);
          if (t.programs.some((p) => p.organization_id === input.organization_id && p.name === input.name && p.status === 'active')) {
            throw new UniqueViolationError('programs_name_org_unique');
          }
          const at = now();
          const row: Program = { program_id: randomUUID(), ...input, status: 'active', created_at: at, updated_at: at };
          t.programs.push(row);
          return { ...row };
        },
        async update(programId, patch) {
          const row = rows(t.programs).find((p) => p.program_id === programId);
          if (!row) return null;
          const name = patch.name ?? row.name;
          const status = patch.status ?? row.status;
          if (
            status === 'active' &&
            t.programs.some(
              (p) => p !== row && p.organization_id === row.organization_id && p.name === name && p.status === 'active',
            )
          ) {
            throw new UniqueViolationError('programs_name_org_unique');
          }
          Object.assign(row, {
            name,
            status,
            description: patch.description !== undefined ? patch.description : row.description,
            level_of_care: patch.level_of_care !== undefined ? patch.level_of_care : row.level_of_care,
            hours_per_week: patch.hours_per_week ?? row.hours_per_week,
            updated_at: now(),
          });
          return { ...row };
        },
      },

      locations: {
        async findById(locationId) {
          return rows(t.locations).find((l) => l.location_id === locationId) ?? null;
        },
        async list(filter) {
          return rows(t.locations)
            .filter((l) => filter.organization_id === undefined || l.organization_id === filter.organization_id)
            .sort(byName);
        },
        async create(input) {
          checkWrite('locations', input.organization_id);
          const at = now();
          const row: Location = { location_id: randomUUID(), ...input, created_at: at, updated_at: at };
          t.locations.push(row);
          return { ...row };
        },
        async update(locationId, patch) {
          const row = rows(t.locations).find((l) => l.location_id === locationId);
          if (!row) return null;
          const touched = Object.values(patch).some((v) => v !== undefined);
          if (!touched) return { ...row };
          row.name = patch.name ?? row.name;
          row.timezone = patch.timezone ?? row.timezone;
          for (const day of DAYS_OF_WEEK) {
            const open = patch[openKey(day)];
            const close = patch[closeKey(day)];
            if (open !== undefined) row[openKey(day)] = open;
            if (close !== undefined) row[closeKey(day)] = close;
          }
          row.updated_at = now();
          return { ...row };
        },
        async delete(locationId) {
          for (const p of rows(t.patients)) {
            if (p.location_id === locationId) {
              p.location_id = null;
              p.assignment_status = 'pending';
              p.updated_at = now();
            }
          }
          const index = t.locations.findIndex((l) => l.location_id === locationId && visible(l.organization_id));
          if (index < 0) return false;
          t.locations.splice(index, 1);
          return true;
        },
      },

      riskTiers: {
        async findById(tierId) {
          return rows(t.riskTiers).find((r) => r.tier_id === tierId) ?? null;
        },
        async list(filter) {
          return rows(t.riskTiers)
            .filter(
              (r) =>
                (filter.organization_id === undefined || r.organization_id === filter.organization_id) &&
                (filter.status === undefined || r.status === filter.status),
            )
            .sort((a, b) => a.sort_order - b.sort_order || a.tier_label.localeCompare(b.tier_label));
        },
        async create(input) {
          checkWrite('risk_tiers', input.organization_id);
          if (t.riskTiers.some((r) => r.organization_id === input.organization_id && r.tier_label === input.tier_label)) {
            throw new UniqueViolationError('risk_tiers_label_org_unique');
          }
          const at = now();
          const row: RiskTier = { tier_id: randomUUID(), ...input, status: 'active', created_at: at, updated_at: at };
          t.riskTiers.push(row);
          return { ...row };
        },
        async update(tierId, patch) {
          const row = rows(t.riskTiers).find((r) => r.tier_id === tierId);
          if (!row) return null;
          const label = patch.tier_label ?? row.tier_label;
          if (
            label !== row.tier_label &&
            t.riskTiers.some((r) => r.organization_id === row.organization_id && r.tier_label === label)
          ) {
            throw new UniqueViolationError('risk_tiers_label_org_unique');
          }
          Object.assign(row, {
            tier_label: label,
            tier_description: patch.tier_description ?? row.tier_description,
            recommended_actions: patch.recommended_actions ?? row.recommended_actions,
            risk_level_range_low: patch.risk_level_range_low ?? row.risk_level_range_low,
            risk_level_range_high: patch.risk_level_range_high ?? row.risk_level_range_high,
            color: patch.color ?? row.color,
            sort_order: patch.sort_order ?? row.sort_order,
            auto_flag_for_followup: patch.auto_flag_for_followup ?? row.auto_flag_for_followup,
            status: patch.status ?? row.status,
            updated_at: now(),
          });
          return { ...row };
        },
        async delete(tierId) {
          const index = t.riskTiers.findIndex((r) => r.tier_id === tierId && visible(r.organization_id));
          if (index < 0) return false;
          const [removed] = t.riskTiers.splice(index, 1);
          for (const m of t.weeklyMetrics) {
            if (removed && m.risk_tier_id === removed.tier_id) m.risk_tier_id = null;
          }
          return true;
        },
      },

      weeklyMetrics: {
        upsert: async (input) => {
          checkWrite('patient_weekly_metrics', input.organization_id);
          if (this.failMetricWritesFor.has(input.patient_id)) {
            throw new Error(`metric write failed for ${input.patient_id}`);
          }
          const existing = t.weeklyMetrics.find(
            (m) => m.patient_id === input.patient_id && m.week_start_date === input.week_start_date,
          );
          if (existing) {
            Object.assign(existing, input, { calculated_at: now() });
            return { ...existing };
          }
          const row: WeeklyMetric = { metric_id: randomUUID(), ...input, calculated_at: now() };
          t.weeklyMetrics.push(row);
          return { ...row };
        },
        async listForWeek(weekStart, organizationId) {
          return rows(t.weeklyMetrics)
            .filter(
              (m) => m.week_start_date === weekStart && (organizationId === undefined || m.organization_id === organizationId),
            )
            .sort((a, b) => b.risk_score - a.risk_score);
        },
      },

      attendance: {
        async weekFacts(weekStart, patients) {
          const facts = new Map<string, AttendanceFacts>();
          const from = new Date(`${weekStart}T00:00:00Z`);
          const to = new Date(`${addDays(weekStart, 7)}T00:00:00Z`);
          for (const patient of patients) {
            const records = rows(t.imports).filter(
              (r) =>
                r.status === 'processed' &&
                r.service_type === 'session' &&
                r.organization_id === patient.organization_id &&
                r.mr === patient.mr &&
                r.started !== null &&
                r.started >= from &&
                r.started < to,
            );
            if (records.length === 0) continue;
            const attended = records.filter((r) => r.attended === 1);
            const minutes = attended.reduce((sum, r) => sum + (r.duration ?? 0), 0);
            facts.set(patient.patient_id, {
              hours_attended: Math.round((minutes / 60) * 100) / 100,
              sessions_attended: attended.length,
              sessions_missed: records.filter((r) => r.absent === 1).length,
            });
          }
          return facts;
        },
        async locationHoursUsed(weekStart, locationIds) {
          const from = new Date(`${weekStart}T00:00:00Z`);
          const to = new Date(`${addDays(weekStart, 7)}T00:00:00Z`);
          const sessions = new Map<string, { locationId: string; minutes: number }>();
          for (const r of rows(t.imports)) {
            if (
              r.status !== 'processed' ||
              r.service_type !== 'session' ||
              r.attended !== 1 ||
              r.location_id === null ||
              !locationIds.includes(r.location_id) ||
              r.started === null ||
              r.started < from ||
              r.started >= to
            ) {
              continue;
            }
            const sessionKey = `${r.location_id}|${r.session_name ?? ''}|${r.started.toISOString()}`;
            const minutes = r.duration ?? 0;
            const seen = sessions.get(sessionKey);
            if (!seen || minutes > seen.minutes) sessions.set(sessionKey, { locationId: r.location_id, minutes });
          }
          const minutesByLocation = new Map<string, number>();
          for (const { locationId, minutes } of sessions.values()) {
            minutesByLocation.set(locationId, (minutesByLocation.get(locationId) ?? 0) + minutes);
          }
          const used = new Map<string, number>();
          for (const [locationId, minutes] of minutesByLocation) {
            used.set(locationId, Math.round((minutes / 60) * 100) / 100);
          }
          return used;
        },
      },

      imports: {
        async summary() {
          const visibleRows = rows(t.imports);
          const counts: ImportStatusCounts = { pending: 0, processing: 0, processed: 0, error: 0, skipped: 0 };
          let latest: Date | null = null;
          for (const r of visibleRows) {
            counts[r.status] += 1;
            if (!latest || r.imported_at > latest) latest = r.imported_at;
          }
          return { total_records: visibleRows.length, ...counts, latest_import: latest };
        },
        async recentFiles(limit) {
          return filesByRecency(rows(t.imports)).slice(0, limit).map((f) => f.file_name);
        },
        async files(limit) {
          return filesByRecency(rows(t.imports)).slice(0, limit);
        },
        async overview() {
          const groups = new Map<string, { group: ImportGroup; records: ImportRecord[] }>();
          for (const r of rows(t.imports)) {
            const key = `${r.organization_id}:${r.location_id ?? ''}`;
            const entry = groups.get(key) ?? {
              group: {
                organization_id: r.organization_id,
                location_id: r.location_id,
                total_records: 0,
                status_breakdown: {},
                latest_import: null,
                recent_files: [],
                processing_errors: [],
              },
              records: [],
            };
            entry.records.push(r);
            entry.group.total_records += 1;
            entry.group.status_breakdown[r.status] = (entry.group.status_breakdown[r.status] ?? 0) + 1;
            if (!entry.group.latest_import || r.imported_at > entry.group.latest_import) {
              entry.group.latest_import = r.imported_at;
            }
            groups.set(key, entry);
          }
          return [...groups.values()].map(({ group, records }) => {
            group.recent_files = filesByRecency(records).slice(0, 5).map((f) => f.file_name);
            const errors = new Map<string, Date>();
            for (const r of records) {
              if (r.status !== 'error' || r.error_message === null) continue;
              const seen = errors.get(r.error_message);
              if (!seen || r.imported_at > seen) errors.set(r.error_message, r.imported_at);
            }
            group.processing_errors = [...errors.entries()]
              .sort((a, b) => b[1].getTime() - a[1].getTime())
              .slice(0, 3)
              .map(([error_message, occurred_at]) => ({ error_message, occurred_at }));
            return group;
          });
        },
        async list(query) {
          const matching = rows(t.imports)
            .filter(
              (r) =>
                (query.status === undefined || r.status === query.status) &&
                (query.service_type === undefined || r.service_type === query.service_type) &&
                (query.file_name === undefined || r.file_name === query.file_name),
            )
            .sort((a, b) => b.imported_at.getTime() - a.imported_at.getTime() || a.record_id.localeCompare(b.record_id));
          return { items: matching.slice(query.offset, query.offset + query.limit), total: matching.length };
        },
        async findById(recordId) {
          return rows(t.imports).find((r) => r.record_id === recordId) ?? null;
        },
        async resetToPending(recordId) {
          const row = rows(t.imports).find(
            (r) => r.record_id === recordId && (r.status === 'error' || r.status === 'skipped'),
          );
          if (!row) return null;
          row.status = 'pending';
          row.error_message = null;
          row.processed_at = null;
          return { ...row };
        },
        async errors(limit) {
          return rows(t.imports)
            .filter((r) => r.status === 'error')
            .sort((a, b) => b.imported_at.getTime() - a.imported_at.getTime())
            .slice(0, limit);
        },
      },

      audit: {
        insert: async (entry) => {
          if (this.failAuditWrites) {
            throw new Error('audit_logs is unavailable');
          }
          t.audit.push({ log_id: randomUUID(), timestamp: now(), ...entry });
        },
        async list(query) {
          const email = query.user_email?.toLowerCase();
          const matching = t.audit
            .filter(
              (e) =>
                (query.user_id === undefined || e.user_id === query.user_id) &&
                (email === undefined || (e.user_email?.toLowerCase().includes(email) ?? false)) &&
                (query.action_type === undefined || e.action_type === query.action_type) &&
                (query.resource_type === undefined || e.resource_type === query.resource_type) &&
                (query.phi_accessed === undefined || e.phi_accessed === query.phi_accessed) &&
                (query.start_date === undefined || e.timestamp >= query.start_date) &&
                (query.end_date === undefined || e.timestamp <= query.end_date) &&
                (query.ip_address === undefined || e.ip_address === query.ip_address),
            )
            .sort(newestFirst);
          return { items: matching.slice(query.offset, query.offset + query.limit), total: matching.length };
        },
        async listPhiAccess(query) {
          return t.audit
            .filter(
              (e) =>
                e.phi_accessed &&
                (query.patient_id === undefined || e.patient_id === query.patient_id) &&
                (query.start_date === undefined || e.timestamp >= query.start_date) &&
                (query.end_date === undefined || e.timestamp <= query.end_date),
            )
            .sort(newestFirst)
            .slice(0, query.limit);
        },
        async listFailedAccess(since) {
          return auditSince(since)
            .filter((e) => e.status_code === 401 || e.status_code === 403)
            .sort(newestFirst);
        },
        async summary(since, windowHours): Promise<AuditSummary> {
          const window = auditSince(since);
          const byAction: AuditSummary['by_action'] = {};
          const byResource: AuditSummary['by_resource'] = {};
          const endpoints = new Map<string, number>();
          for (const e of window) {
            byAction[e.action_type] = (byAction[e.action_type] ?? 0) + 1;
            byResource[e.resource_type] = (byResource[e.resource_type] ?? 0) + 1;
            endpoints.set(e.endpoint, (endpoints.get(e.endpoint) ?? 0) + 1);
          }
          return {
            window_hours: windowHours,
            total_requests: window.length,
            unique_users: new Set(window.flatMap((e) => (e.user_id ? [e.user_id] : []))).size,
            phi_access_count: window.filter((e) => e.phi_accessed).length,
            failed_requests: window.filter((e) => e.status_code >= 400).length,
            access_denied_count: window.filter((e) => e.action_type === 'ACCESS_DENIED').length,
            export_count: window.filter((e) => e.data_exported).length,
            by_action: byAction,
            by_resource: byResource,
            top_endpoints: [...endpoints.entries()]
              .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
              .slice(0, 10)
              .map(([endpoint, count]) => ({ endpoint, count })),
          };
        },
        async deleteOlderThan(cutoff) {
          const before = t.audit.length;
          const kept = t.audit.filter((e) => e.timestamp >= cutoff);
          t.audit.splice(0, t.audit.length, ...kept);
          return before - kept.length;
        },
      },
    };
  }
}

function filesByRecency(records: ImportRecord[]): Array<{ file_name: string; record_count: number; latest_import: Date }> {
  const files = new Map<string, { file_name: string; record_count: number; latest_import: Date }>();
  for (const r of records) {
    if (r.file_name === null) continue;
    const file = files.get(r.file_name);
    if (!file) {
      files.set(r.file_name, { file_name: r.file_name, record_count: 1, latest_import: r.imported_at });
      continue;
    }
    file.record_count += 1;
    if (r.imported_at > file.latest_import) file.latest_import = r.imported_at;
  }
  return [...files.values()].sort((a, b) => b.latest_import.getTime() - a.latest_import.getTime());
}
