// =============================================================================
// Attendwell API: Auth & user administration routes
// POST  /auth/login
// POST  /auth/logout
// POST  /auth/forgot-password
// GET   /auth/me
// POST  /auth/create-user
// GET   /auth/organizations
// GET   /auth/users
// PATCH /auth/users/:id/toggle-status
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  CreateUserSchema,
  ForgotPasswordSchema,
  LoginSchema,
  ROLES,
  UuidSchema,
  type CreateUserInput,
  type Principal,
} from '@attendwell/shared';
import { ForbiddenError, NotFoundError, ValidationError } from '../lib/errors.js';
import { principalOf, type AccessTokenPayload } from '../plugins/auth.js';
import { UniqueViolationError } from '../repositories/types.js';
import { isSuperuser, scopeOrgId } from '../services/authorization.js';
import { authenticateCredentials } from '../services/principal.js';

const FORGOT_PASSWORD_MESSAGE =
  'If an account exists for that email, password reset instructions will be sent.';

/**
 * Organization the new account belongs to. System admins choose freely within
 * the role rules; organization admins can only add non-system users to their own.
 */
function targetOrganization(caller: Principal, body: CreateUserInput): string | null {
  const requested = body.organization_id ?? null;

  if (isSuperuser(caller)) {
    if (body.role === ROLES.SUPERUSER) {
      if (requested) throw new ValidationError('System administrators cannot belong to an organization');
      return null;
    }
    if (!requested) throw new ValidationError('organization_id is required for this role');
    return requested;
  }

  if (body.role === ROLES.SUPERUSER) {
    throw new ForbiddenError('Organization admins cannot create system administrators');
  }
  if (requested && requested !== caller.organization_id) {
    throw new ForbiddenError('Cannot create users in another organization');
  }
  if (!caller.organization_id) {
    throw new ForbiddenError('User is not affiliated with an organization');
  }
  return caller.organization_id;
}

export default async function authRoutes(fastify: FastifyInstance): Promise<void> {
  const { store, hasher } = fastify;
  const authenticated = { preHandler: [fastify.requireAuthenticated] };
  const anyAdmin = { preHandler: [fastify.requireAnyAdmin] };
  const superuser = { preHandler: [fastify.requireSuperuser] };

  // ---------------------------------------------------------------------------
  // POST /login
  // ---------------------------------------------------------------------------
  fastify.post('/login', async (request, reply) => {
    const body = LoginSchema.parse(request.body);

    const principal = await store.withSystem((repos) =>
      authenticateCredentials(
        {
          findCredentialsByEmail: (email) => repos.users.findCredentialsByEmail(email),
          recordLogin: (userId, at) => repos.users.recordLogin(userId, at),
          hasher,
        },
        body.email,
        body.password,
      ),
    );
    request.principal = principal;

    const payload: AccessTokenPayload = { sub: principal.email };
    const accessToken = fastify.jwt.sign(payload);

    return reply.send({
      success: true,
      data: { access_token: accessToken, token_type: 'bearer', user: principal },
    });
  });

  // ---------------------------------------------------------------------------
  // POST /logout: tokens are stateless; the client discards its copy
  // ---------------------------------------------------------------------------
  fastify.post('/logout', authenticated, async (_request, reply) => {
    return reply.send({ success: true, data: { message: 'Successfully logged out' } });
  });

  // ---------------------------------------------------------------------------
  // POST /forgot-password
  // ---------------------------------------------------------------------------
  fastify.post('/forgot-password', async (request, reply) => {
    ForgotPasswordSchema.parse(request.body);
    return reply.send({ success: true, data: { message: FORGOT_PASSWORD_MESSAGE } });
  });

  // ---------------------------------------------------------------------------
  // GET /me
  // ---------------------------------------------------------------------------
  fastify.get('/me', authenticated, async (request, reply) => {
    return reply.send({ success: true, data: principalOf(request) });
  });

  // ---------------------------------------------------------------------------
  // POST /create-user
  // ---------------------------------------------------------------------------
  fastify.post('/create-user', anyAdmin, async (request, reply) => {
    const caller = principalOf(request);
    const body = CreateUserSchema.parse(request.body);
    const organizationId = targetOrganization(caller, body);
    const email = body.email.toLowerCase();

    if (organizationId) {
      const org = await store.withSystem((repos) => repos.organizations.findById(organizationId));
      if (!org || org.status !== 'active') {
        throw new ValidationError('Organization not found or inactive');
      }
    }

    const locationId = body.location_id ?? null;
    if (locationId) {
      const location = await request.scoped((repos) => repos.locations.findById(locationId));
      if (!location || location.organization_id !== organizationId) {
        throw new ValidationError('Location not found in the target organization');
      }
    }

    const passwordHash = await hasher.hash(body.password);

    try {
      const user = await store.withSystem(async (repos) => {
        if (await repos.users.existsByEmailOrUsername(email, body.username)) {
          throw new ValidationError('Email or username already registered');
        }
        return repos.users.create({
          username: body.username,
          email,
          password_hash: passwordHash,
          role: body.role,
          organization_id: organizationId,
          location_id: locationId,
        });
      });
      request.log.info({ user_id: user.user_id, role: user.role }, 'User created');
      return reply.status(201).send({ success: true, data: user });
    } catch (err) {
      if (err instanceof UniqueViolationError) {
        throw new ValidationError('Email or username already registered');
      }
      throw err;
    }
  });

  // ---------------------------------------------------------------------------
  // GET /organizations
  // ---------------------------------------------------------------------------
  fastify.get('/organizations', authenticated, async (request, reply) => {
    const caller = principalOf(request);
    const organizations = await store.withSystem(async (repos) => {
      if (isSuperuser(caller)) return repos.organizations.listActive();
      if (!caller.organization_id) return [];
      const own = await repos.organizations.findById(caller.organization_id);
      return own ? [own] : [];
    });
    return reply.send({ success: true, data: organizations });
  });

  // ---------------------------------------------------------------------------
  // GET /users
  // ---------------------------------------------------------------------------
  fastify.get('/users', anyAdmin, async (request, reply) => {
    const orgId = scopeOrgId(principalOf(request)) ?? null;
    const users = await store.withSystem((repos) => repos.users.list(orgId));
    return reply.send({ success: true, data: users });
  });

  // ---------------------------------------------------------------------------
  // PATCH /users/:id/toggle-status
  // ---------------------------------------------------------------------------
  fastify.patch('/users/:id/toggle-status', superuser, async (request, reply) => {
    const { id } = z.object({ id: UuidSchema }).parse(request.params);

    const user = await store.withSystem(async (repos) => {
      const existing = await repos.users.findById(id);
      if (!existing) throw new NotFoundError('User');
      if (existing.is_active && existing.role === ROLES.SUPERUSER) {
        throw new ValidationError('System administrators cannot be deactivated');
      }
      return repos.users.setActive(id, !existing.is_active);
    });
    if (!user) throw new NotFoundError('User');

    request.log.info({ user_id: user.user_id, is_active: user.is_active }, 'User status toggled');
    return reply.send({ success: true, data: user });
  });
}
