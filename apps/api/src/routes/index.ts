// =============================================================================
// Attendwell API: Route registry
// =============================================================================

import type { FastifyInstance } from 'fastify';
import healthRoutes from './health.js';
import authRoutes from './auth.js';
import patientRoutes from './patients/index.js';
import locationRoutes from './locations/index.js';
import dataImportRoutes from './data-import/index.js';
import engagementRoutes from './engagement/index.js';
import auditRoutes from './audit/index.js';

export async function registerRoutes(fastify: FastifyInstance): Promise<void> {
  // Health check, no auth
  await fastify.register(healthRoutes);

  await fastify.register(authRoutes, { prefix: '/auth' });
  await fastify.register(patientRoutes, { prefix: '/patients' });
  await fastify.register(locationRoutes, { prefix: '/locations' });
  await fastify.register(dataImportRoutes, { prefix: '/data-import' });
  await fastify.register(engagementRoutes, { prefix: '/engagement' });
  await fastify.register(auditRoutes, { prefix: '/audit' });
}
