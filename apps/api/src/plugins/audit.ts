// =============================================================================
// Attendwell API: Request audit trail
//
// One audit_logs row per audited request, written in onSend so the final
// status code is known. The write is awaited but can never change the
// response: every failure on the way is logged and dropped.
// =============================================================================

import { createHash } from 'crypto';
import { performance } from 'perf_hooks';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import type { NewAuditLogEntry, Principal } from '@attendwell/shared';
import {
  classifyRequest,
  clientIp,
  extractPatientId,
  isDataExport,
  isPhiPath,
  shouldAudit,
} from '../services/auditClassifier.js';

declare module 'fastify' {
  interface FastifyRequest {
    auditStartedAt: number;
  }
}

const HASHED_METHODS = new Set(['POST', 'PUT', 'PATCH']);
const SESSION_HEADER = 'x-session-id';

function headerValue(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : null;
}

function pathOf(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : url.slice(0, q);
}

function queryParameters(query: unknown): Record<string, string> | null {
  if (!query || typeof query !== 'object') return null;
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === 'string') out[key] = value;
    else if (Array.isArray(value)) out[key] = value.map(String).join(',');
  }
  return Object.keys(out).length > 0 ? out : null;
}

function bodyHash(request: FastifyRequest): string | null {
  if (!HASHED_METHODS.has(request.method) || request.body === undefined || request.body === null) {
    return null;
  }
  const raw = typeof request.body === 'string' ? request.body : JSON.stringify(request.body);
  return createHash('sha256').update(raw).digest('hex');
}

export function buildAuditEntry(
  request: FastifyRequest,
  reply: FastifyReply,
  principal: Principal | null,
  now: number,
): NewAuditLogEntry {
  const path = pathOf(request.url);
  const statusCode = reply.statusCode;
  const { actionType, resourceType, resourceId } = classifyRequest(request.method, path, statusCode);
  const query = queryParameters(request.query);

  return {
    user_id: principal?.user_id ?? null,
    user_email: principal?.email ?? null,
    user_role: principal?.role ?? null,
    organization_id: principal?.organization_id ?? null,
    session_id: headerValue(request.headers[SESSION_HEADER]) ?? request.id,
    method: request.method,
    endpoint: path,
    full_url: `${request.protocol}://${request.hostname}${request.url}`,
    user_agent: headerValue(request.headers['user-agent']),
    ip_address: clientIp(request.headers, request.ip),
    status_code: statusCode,
    response_time_ms: Math.max(0, Math.round(now - request.auditStartedAt)),
    action_type: actionType,
    resource_type: resourceType,
    resource_id: resourceId,
    phi_accessed: isPhiPath(path),
    patient_id: extractPatientId(path, query ?? {}),
    data_exported: isDataExport(path, statusCode),
    request_body_hash: bodyHash(request),
    query_parameters: query,
  };
}

async function auditPlugin(fastify: FastifyInstance): Promise<void> {
  const enabled = fastify.appConfig.auditLoggingEnabled;

  fastify.decorateRequest('auditStartedAt', 0);

  fastify.addHook('onRequest', async (request) => {
    request.auditStartedAt = performance.now();
  });

  fastify.addHook('onSend', async (request, reply, payload) => {
    if (!shouldAudit(request.url, enabled)) return payload;

    try {
      // Routes without a gate leave the principal unresolved; attribution is best effort
      let principal = request.principal;
      if (!principal && request.headers.authorization) {
        principal = await fastify.authenticate(request).catch((err: unknown) => {
          request.log.debug({ err }, 'Audit: caller could not be attributed');
          return null;
        });
      }
      const entry = buildAuditEntry(request, reply, principal, performance.now());
      await fastify.store.withSystem((repos) => repos.audit.insert(entry));
    } catch (err) {
      request.log.error({ err, url: request.url }, 'Audit log write failed');
    }
    return payload;
  });
}

export default fp(auditPlugin, { name: 'audit', dependencies: ['context', 'auth'] });
