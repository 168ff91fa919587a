// =============================================================================
// Attendwell API: Role admission & tenant scoping
// =============================================================================

import { ROLES, type Principal } from '@attendwell/shared';
import type { TenantContext } from '@attendwell/db';
import { ForbiddenError, ValidationError } from '../lib/errors.js';

export type AdmissionCheck =
  | 'requireSuperuser'
  | 'requireTenantAdmin'
  | 'requireAnyAdmin'
  | 'requireAuthenticated';

export function isSuperuser(principal: Principal): boolean {
  return principal.role === ROLES.SUPERUSER;
}

export function isTenantAdmin(principal: Principal): boolean {
  return principal.role === ROLES.TENANT_ADMIN;
}

const ADMISSION: Record<AdmissionCheck, { allows: (p: Principal) => boolean; message: string }> = {
  requireSuperuser: {
    allows: isSuperuser,
    message: 'System admin access required',
  },
  requireTenantAdmin: {
    allows: isTenantAdmin,
    message: 'Organization admin access required',
  },
  requireAnyAdmin: {
    allows: (p) => isSuperuser(p) || isTenantAdmin(p),
    message: 'Admin access required',
  },
  requireAuthenticated: {
    allows: (p) => p.is_active,
    message: 'Active account required',
  },
};

/** Throws ForbiddenError when `principal` does not pass `check`. */
export function admit(check: AdmissionCheck, principal: Principal): void {
  const rule = ADMISSION[check];
  if (!rule.allows(principal)) {
    throw new ForbiddenError(rule.message);
  }
}

export function tenantContextFor(principal: Principal): TenantContext {
  return {
    role: principal.role,
    orgId: isSuperuser(principal) ? null : principal.organization_id,
  };
}

/**
 * Organization a write applies to. System admins must name one; everyone
 * else is pinned to their own, whatever the request carried.
 */
export function resolveTargetOrgId(principal: Principal, requested: string | null | undefined): string {
  if (isSuperuser(principal)) {
    if (!requested) {
      throw new ValidationError('organization_id is required for system administrators');
    }
    return requested;
  }
  if (!principal.organization_id) {
    throw new ForbiddenError('User is not affiliated with an organization');
  }
  return principal.organization_id;
}

/** Organization to filter reads by: none for system admins. */
export function scopeOrgId(principal: Principal): string | undefined {
  return isSuperuser(principal) ? undefined : principal.organization_id ?? undefined;
}
