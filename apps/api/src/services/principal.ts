// =============================================================================
// Attendwell API: Principal resolution & login
// =============================================================================

import type { Principal } from '@attendwell/shared';
import { UnauthenticatedError } from '../lib/errors.js';
import type { PasswordHasher } from '../lib/passwords.js';
import type { UserCredentials } from '../repositories/types.js';

export interface PrincipalResolverDeps {
  /** Signature + expiry check; the claimed email, or null when invalid. */
  verifyToken(token: string): Promise<string | null>;
  findActivePrincipalByEmail(email: string): Promise<Principal | null>;
}

/**
 * Bearer credential to principal. Every failure is the same
 * UnauthenticatedError, so ordinary calls reveal nothing about whether an
 * account exists or has been deactivated.
 */
export async function resolvePrincipal(
  deps: PrincipalResolverDeps,
  token: string | null,
): Promise<Principal> {
  if (!token) {
    throw new UnauthenticatedError();
  }
  const email = await deps.verifyToken(token);
  if (!email) {
    throw new UnauthenticatedError();
  }
  const principal = await deps.findActivePrincipalByEmail(email);
  if (!principal || !principal.is_active) {
    throw new UnauthenticatedError();
  }
  return principal;
}

export interface LoginDeps {
  findCredentialsByEmail(email: string): Promise<UserCredentials | null>;
  recordLogin(userId: string, at: Date): Promise<void>;
  hasher: PasswordHasher;
  now?: () => Date;
}

const BAD_CREDENTIALS = 'Incorrect email or password';

// Verified against when the email is unknown so both paths cost one hash check
const TIMING_DIGEST =
  '$argon2id$v=19$m=19456,t=2,p=1$dGltaW5nLXNhbHQtdmFsdWU$2c1Ryq0Gk2S0u0tQW5sS3d6v6c3p3o0hXz1r8a1wUqA';

/**
 * Password login. Unlike resolvePrincipal this is the one place a
 * deactivated account is reported as such.
 */
export async function authenticateCredentials(
  deps: LoginDeps,
  email: string,
  password: string,
): Promise<Principal> {
  const user = await deps.findCredentialsByEmail(email.toLowerCase());
  if (!user) {
    await deps.hasher.verify(TIMING_DIGEST, password);
    throw new UnauthenticatedError(BAD_CREDENTIALS, 'INVALID_CREDENTIALS');
  }

  const valid = await deps.hasher.verify(user.password_hash, password);
  if (!valid) {
    throw new UnauthenticatedError(BAD_CREDENTIALS, 'INVALID_CREDENTIALS');
  }
  if (!user.is_active) {
    throw new UnauthenticatedError('Account is deactivated', 'ACCOUNT_DEACTIVATED');
  }

  await deps.recordLogin(user.user_id, (deps.now ?? (() => new Date()))());

  const { password_hash: _omit, ...principal } = user;
  return principal;
}
