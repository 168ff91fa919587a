import { describe, it, expect } from 'vitest';
import type { Principal } from '@attendwell/shared';
import { ForbiddenError, ValidationError } from '../lib/errors.js';
import { admit, resolveTargetOrgId, scopeOrgId, tenantContextFor, type AdmissionCheck } from './authorization.js';

const ORG = '11111111-1111-4111-8111-111111111111';
const OTHER_ORG = '22222222-2222-4222-8222-222222222222';

function principal(overrides: Partial<Principal>): Principal {
  return {
    user_id: 'u-1',
    username: 'someone',
    email: 'someone@example.test',
    role: 'user',
    organization_id: ORG,
    location_id: null,
    is_active: true,
    ...overrides,
  };
}

const superuser = principal({ role: 'system_admin', organization_id: null });
const tenantAdmin = principal({ role: 'organization_admin' });
const user = principal({ role: 'user' });

describe('admit', () => {
  const cases: Array<[AdmissionCheck, Principal, boolean]> = [
    ['requireSuperuser', superuser, true],
    ['requireSuperuser', tenantAdmin, false],
    ['requireSuperuser', user, false],
    ['requireTenantAdmin', superuser, false],
    ['requireTenantAdmin', tenantAdmin, true],
    ['requireTenantAdmin', user, false],
    ['requireAnyAdmin', superuser, true],
    ['requireAnyAdmin', tenantAdmin, true],
    ['requireAnyAdmin', user, false],
    ['requireAuthenticated', user, true],
    ['requireAuthenticated', principal({ is_active: false }), false],
  ];

  it.each(cases)('%s for %o admits: %s', (check, who, admitted) => {
    if (admitted) {
      expect(() => admit(check, who)).not.toThrow();
    } else {
      expect(() => admit(check, who)).toThrow(ForbiddenError);
    }
  });

  it('names the missing capability', () => {
    expect(() => admit('requireSuperuser', tenantAdmin)).toThrow('System admin access required');
  });
});

describe('tenantContextFor', () => {
  it('clears the organization for system admins', () => {
    expect(tenantContextFor(superuser)).toEqual({ role: 'system_admin', orgId: null });
  });

  it('pins everyone else to their organization', () => {
    expect(tenantContextFor(tenantAdmin)).toEqual({ role: 'organization_admin', orgId: ORG });
  });
});

describe('resolveTargetOrgId', () => {
  it('requires system admins to name the organization', () => {
    expect(() => resolveTargetOrgId(superuser, undefined)).toThrow(ValidationError);
    expect(resolveTargetOrgId(superuser, OTHER_ORG)).toBe(OTHER_ORG);
  });

  it('overrides whatever a tenant admin supplied', () => {
    expect(resolveTargetOrgId(tenantAdmin, OTHER_ORG)).toBe(ORG);
    expect(resolveTargetOrgId(tenantAdmin, null)).toBe(ORG);
  });

  it('rejects an unaffiliated non-superuser', () => {
    expect(() => resolveTargetOrgId(principal({ role: 'organization_admin', organization_id: null }), ORG)).toThrow(
      ForbiddenError,
    );
  });
});

describe('scopeOrgId', () => {
  it('is unset for system admins and the own organization otherwise', () => {
    expect(scopeOrgId(superuser)).toBeUndefined();
    expect(scopeOrgId(user)).toBe(ORG);
  });
});
