// =============================================================================
// Attendwell API: Process-wide handles
// The config, the DataStore and the password hasher are created once at
// startup and reached through the Fastify instance; nothing imports a global.
// =============================================================================

import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { AppConfig } from '../config.js';
import type { PasswordHasher } from '../lib/passwords.js';
import type { DataStore } from '../repositories/types.js';

export interface AppContext {
  config: AppConfig;
  store: DataStore;
  hasher: PasswordHasher;
}

declare module 'fastify' {
  interface FastifyInstance {
    appConfig: AppConfig;
    store: DataStore;
    hasher: PasswordHasher;
  }
}

async function contextPlugin(fastify: FastifyInstance, opts: AppContext): Promise<void> {
  fastify.decorate('appConfig', opts.config);
  fastify.decorate('store', opts.store);
  fastify.decorate('hasher', opts.hasher);
}

export default fp(contextPlugin, { name: 'context' });
