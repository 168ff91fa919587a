// =============================================================================
// Attendwell API: Tenancy plugin
//
// request.scoped(fn) is the only way a handler reaches tenant-owned tables.
// Every call checks out its own connection and applies the caller's role and
// organization inside the transaction before fn runs.
// =============================================================================

import type { FastifyInstance, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import type { Repositories } from '../repositories/types.js';
import { tenantContextFor } from '../services/authorization.js';
import { principalOf } from './auth.js';

declare module 'fastify' {
  interface FastifyRequest {
    scoped<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
  }
}

async function tenancyPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.decorateRequest('scoped', async function scoped<T>(
    this: FastifyRequest,
    fn: (repos: Repositories) => Promise<T>,
  ): Promise<T> {
    return fastify.store.withTenant(tenantContextFor(principalOf(this)), fn);
  });
}

export default fp(tenancyPlugin, { name: 'tenancy', dependencies: ['context', 'auth'] });
