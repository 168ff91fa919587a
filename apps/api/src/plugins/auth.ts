// =============================================================================
// Attendwell API: Auth plugin
// Registers @fastify/jwt and the role gates used as route preHandlers.
// The bearer token only carries the user's email; the principal is looked up
// on every request so deactivation takes effect immediately.
// =============================================================================

import type { FastifyInstance, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import fastifyJwt from '@fastify/jwt';
import type { Principal } from '@attendwell/shared';
import { UnauthenticatedError } from '../lib/errors.js';
import { admit, type AdmissionCheck } from '../services/authorization.js';
import { resolvePrincipal } from '../services/principal.js';

export interface AccessTokenPayload {
  sub: string; // user email
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: AccessTokenPayload;
    user: AccessTokenPayload;
  }
}

type Gate = (request: FastifyRequest) => Promise<void>;

declare module 'fastify' {
  interface FastifyInstance {
    /** Resolves (once per request) and caches the caller on request.principal. */
    authenticate: (request: FastifyRequest) => Promise<Principal>;
    requireSuperuser: Gate;
    requireTenantAdmin: Gate;
    requireAnyAdmin: Gate;
    requireAuthenticated: Gate;
  }
  interface FastifyRequest {
    principal: Principal | null;
  }
}

function extractToken(request: FastifyRequest): string | null {
  const auth = request.headers.authorization;
  if (!auth || !/^Bearer\s/i.test(auth)) return null;
  const parts = auth.split(' ');
  return parts.length === 2 ? parts[1] ?? null : null;
}

/** Principal set by a gate earlier in the request; handlers behind a gate use this. */
export function principalOf(request: FastifyRequest): Principal {
  if (!request.principal) {
    throw new UnauthenticatedError();
  }
  return request.principal;
}

async function authPlugin(fastify: FastifyInstance): Promise<void> {
  await fastify.register(fastifyJwt, {
    secret: fastify.appConfig.jwtSecret,
    sign: {
      expiresIn: fastify.appConfig.jwtAccessExpiry,
    },
    verify: { extractToken },
  });

  fastify.decorateRequest('principal', null);

  fastify.decorate('authenticate', async (request: FastifyRequest): Promise<Principal> => {
    if (request.principal) return request.principal;

    const principal = await fastify.store.withSystem((repos) =>
      resolvePrincipal(
        {
          verifyToken: async (token) => {
            try {
              const payload = fastify.jwt.verify<AccessTokenPayload>(token);
              return typeof payload.sub === 'string' ? payload.sub : null;
            } catch (err) {
              request.log.debug({ err }, 'Bearer token rejected');
              return null;
            }
          },
          findActivePrincipalByEmail: (email) => repos.users.findActivePrincipalByEmail(email),
        },
        extractToken(request),
      ),
    );
    request.principal = principal;
    return principal;
  });

  const gate = (check: AdmissionCheck): Gate => async (request) => {
    const principal = await fastify.authenticate(request);
    admit(check, principal);
  };

  fastify.decorate('requireSuperuser', gate('requireSuperuser'));
  fastify.decorate('requireTenantAdmin', gate('requireTenantAdmin'));
  fastify.decorate('requireAnyAdmin', gate('requireAnyAdmin'));
  fastify.decorate('requireAuthenticated', gate('requireAuthenticated'));
}

export default fp(authPlugin, { name: 'auth', dependencies: ['context'] });
