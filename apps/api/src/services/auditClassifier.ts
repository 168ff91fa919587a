// =============================================================================
// Attendwell API: Audit decision logic
//
// Pure functions deciding whether a request is audited and how it is
// classified. Path matching is by whole segment, so '/patients-archive' is not
// a patients path and '/patients/export' is an export.
// =============================================================================

import {
  AUDIT_EXCLUDED_PREFIXES,
  AUDIT_LOGIN_PATH,
  AUDIT_LOGOUT_PATH,
  AUDIT_RESOURCE_SEGMENTS,
  EXPORT_PATH_SEGMENTS,
  PHI_PATH_SEGMENTS,
  type AuditActionType,
  type AuditResourceType,
} from '@attendwell/shared';

export interface RequestClassification {
  actionType: AuditActionType;
  resourceType: AuditResourceType;
  resourceId: string | null;
}

function stripQuery(path: string): string {
  const q = path.indexOf('?');
  return q === -1 ? path : path.slice(0, q);
}

function segmentsOf(path: string): string[] {
  return stripQuery(path).split('/').filter((s) => s.length > 0);
}

function normalise(path: string): string {
  const bare = stripQuery(path);
  return bare.length > 1 && bare.endsWith('/') ? bare.slice(0, -1) : bare;
}

/** Syntactic UUID shape only: 36 characters with exactly four hyphens. */
export function looksLikeUuid(value: string): boolean {
  if (value.length !== 36) return false;
  let hyphens = 0;
  for (const ch of value) {
    if (ch === '-') hyphens += 1;
  }
  return hyphens === 4;
}

export function shouldAudit(path: string, enabled: boolean): boolean {
  if (!enabled) return false;
  const bare = stripQuery(path);
  return !AUDIT_EXCLUDED_PREFIXES.some((prefix) => bare.startsWith(prefix));
}

export function isPhiPath(path: string): boolean {
  return segmentsOf(path).some((s) => PHI_PATH_SEGMENTS.includes(s));
}

export function isExportPath(path: string): boolean {
  return segmentsOf(path).some((s) => EXPORT_PATH_SEGMENTS.includes(s));
}

export function classifyAction(method: string, path: string, statusCode: number): AuditActionType {
  const bare = normalise(path);
  if (bare === AUDIT_LOGIN_PATH) return 'LOGIN';
  if (bare === AUDIT_LOGOUT_PATH) return 'LOGOUT';
  if (statusCode === 403) return 'ACCESS_DENIED';
  if (isExportPath(path)) return 'EXPORT';

  switch (method.toUpperCase()) {
    case 'POST': return 'CREATE';
    case 'GET': case 'HEAD': return 'READ';
    case 'PUT': case 'PATCH': return 'UPDATE';
    case 'DELETE': return 'DELETE';
    default: return 'READ';
  }
}

/** Collections whose next segment is never recorded as the resource id. */
const ID_LESS_RESOURCES: readonly AuditResourceType[] = ['AUTH', 'ENGAGEMENT', 'RISK'];

/** First collection, in classification order, present in the path. */
function matchResource(segments: string[]): readonly [string, AuditResourceType] | null {
  for (const entry of AUDIT_RESOURCE_SEGMENTS) {
    if (segments.includes(entry[0])) return entry;
  }
  return null;
}

export function classifyResource(path: string): AuditResourceType {
  return matchResource(segmentsOf(path))?.[1] ?? 'SYSTEM';
}

/** UUID following `collection` in the path, if the next segment has that shape. */
function idAfter(segments: string[], collection: string): string | null {
  const idx = segments.indexOf(collection);
  if (idx === -1) return null;
  const next = segments[idx + 1];
  return next !== undefined && looksLikeUuid(next) ? next : null;
}

/**
 * UUID directly after the collection that decided the resource type. A UUID
 * after any other collection in the same path is not the audited resource.
 */
export function extractResourceId(path: string): string | null {
  const segments = segmentsOf(path);
  const match = matchResource(segments);
  if (!match || ID_LESS_RESOURCES.includes(match[1])) return null;
  return idAfter(segments, match[0]);
}

export function extractPatientId(path: string, query: Record<string, unknown>): string | null {
  const fromPath = idAfter(segmentsOf(path), 'patients');
  if (fromPath) return fromPath;
  const fromQuery = query['patient_id'];
  return typeof fromQuery === 'string' && looksLikeUuid(fromQuery) ? fromQuery : null;
}

export function classifyRequest(method: string, path: string, statusCode: number): RequestClassification {
  return {
    actionType: classifyAction(method, path, statusCode),
    resourceType: classifyResource(path),
    resourceId: extractResourceId(path),
  };
}

/** Export flag: export path AND a 200 response. */
export function isDataExport(path: string, statusCode: number): boolean {
  return statusCode === 200 && isExportPath(path);
}

/** First X-Forwarded-For hop, then X-Real-IP, then the socket address. */
export function clientIp(headers: Record<string, string | string[] | undefined>, socketIp: string): string {
  const forwarded = headers['x-forwarded-for'];
  const forwardedValue = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (forwardedValue) {
    const first = forwardedValue.split(',')[0]?.trim();
    if (first) return first;
  }
  const realIp = headers['x-real-ip'];
  const realIpValue = Array.isArray(realIp) ? realIp[0] : realIp;
  if (realIpValue) return realIpValue;
  return socketIp;
}
