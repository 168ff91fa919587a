// =============================================================================
// Attendwell: Tenancy context propagation
//
// Row-level security policies on every tenant-owned table read two settings:
//   app.current_user_role    the caller's role
//   app.current_user_org_id  the caller's organization, '' for system admins
//
// Both are set with set_config(..., TRUE), so they are local to the
// transaction and vanish on COMMIT/ROLLBACK before the connection returns to
// the pool. The next checkout starts with neither set.
// =============================================================================

import type { Sql, TransactionSql } from './client.js';

export interface TenantContext {
  role: string;
  /** null clears the organization filter (system admins see every tenant). */
  orgId: string | null;
}

/** The slice of a postgres.js transaction handle that context setup needs. */
export type TaggedQuery = (
  template: TemplateStringsArray,
  ...values: string[]
) => PromiseLike<unknown>;

export const ROLE_SETTING = 'app.current_user_role';
export const ORG_SETTING = 'app.current_user_org_id';

/**
 * Apply the tenancy settings on an open transaction. Must run before the
 * first tenant-scoped statement of that transaction.
 */
export async function applyTenantContext(tx: TaggedQuery, ctx: TenantContext): Promise<void> {
  if (!ctx.role) {
    throw new Error('Tenant context requires a role');
  }
  const orgId = ctx.orgId ?? '';
  await tx`
    SELECT
      set_config(${ROLE_SETTING}, ${ctx.role}, TRUE),
      set_config(${ORG_SETTING}, ${orgId}, TRUE)
  `;
}

/**
 * Check out a connection, open a transaction, apply `ctx`, then run `fn`.
 * Commits when `fn` resolves, rolls back when it throws; the connection is
 * released either way.
 */
export async function withTenantContext<T>(
  sql: Sql,
  ctx: TenantContext,
  fn: (tx: TransactionSql) => Promise<T>,
): Promise<T> {
  const result = await sql.begin(async (tx) => {
    await applyTenantContext(tx, ctx);
    return { value: await fn(tx) };
  });
  return result.value;
}

/**
 * Transaction with no tenancy settings. RLS-protected tables return no rows
 * here; use only for tables outside tenant scope (users, organizations,
 * audit_logs).
 */
export async function withoutTenantContext<T>(
  sql: Sql,
  fn: (tx: TransactionSql) => Promise<T>,
): Promise<T> {
  const result = await sql.begin(async (tx) => ({ value: await fn(tx) }));
  return result.value;
}
