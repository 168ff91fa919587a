import { describe, it, expect } from 'vitest';
import {
  classifyAction,
  classifyRequest,
  classifyResource,
  clientIp,
  extractPatientId,
  extractResourceId,
  isDataExport,
  isPhiPath,
  looksLikeUuid,
  shouldAudit,
} from './auditClassifier.js';

const PATIENT_ID = '3fa85f64-5717-4562-b3fc-2c963f66afa6';

describe('shouldAudit', () => {
  it('records nothing while disabled', () => {
    expect(shouldAudit('/patients', false)).toBe(false);
  });

  it('skips health, docs and static prefixes', () => {
    expect(shouldAudit('/health', true)).toBe(false);
    expect(shouldAudit('/docs/json', true)).toBe(false);
    expect(shouldAudit('/static/logo.png', true)).toBe(false);
    expect(shouldAudit('/favicon.ico', true)).toBe(false);
  });

  it('records everything else, query string or not', () => {
    expect(shouldAudit('/patients?assignment_status=pending', true)).toBe(true);
    expect(shouldAudit('/auth/login', true)).toBe(true);
  });
});

describe('classifyAction', () => {
  it('recognises login and logout before looking at the status', () => {
    expect(classifyAction('POST', '/auth/login', 401)).toBe('LOGIN');
    expect(classifyAction('POST', '/auth/login/', 403)).toBe('LOGIN');
    expect(classifyAction('POST', '/auth/logout', 200)).toBe('LOGOUT');
  });

  it('marks every 403 as access denied, exports included', () => {
    expect(classifyAction('GET', '/audit/logs', 403)).toBe('ACCESS_DENIED');
    expect(classifyAction('GET', '/patients/export/high-risk', 403)).toBe('ACCESS_DENIED');
  });

  it('marks export paths as exports regardless of method', () => {
    expect(classifyAction('GET', '/patients/export/high-risk', 200)).toBe('EXPORT');
    expect(classifyAction('POST', '/reports/download', 500)).toBe('EXPORT');
  });

  it('maps methods otherwise', () => {
    expect(classifyAction('POST', '/patients', 201)).toBe('CREATE');
    expect(classifyAction('get', '/patients/all', 200)).toBe('READ');
    expect(classifyAction('HEAD', '/patients/all', 200)).toBe('READ');
    expect(classifyAction('PUT', `/patients/${PATIENT_ID}`, 200)).toBe('UPDATE');
    expect(classifyAction('PATCH', '/locations/x/timings', 200)).toBe('UPDATE');
    expect(classifyAction('DELETE', `/patients/${PATIENT_ID}`, 200)).toBe('DELETE');
    expect(classifyAction('OPTIONS', '/patients', 204)).toBe('READ');
  });
});

describe('classifyResource', () => {
  it('takes the first collection in classification order', () => {
    expect(classifyResource('/auth/users')).toBe('AUTH');
    expect(classifyResource('/patients/risk/current-week')).toBe('PATIENT');
    expect(classifyResource('/patients/programs')).toBe('PATIENT');
    expect(classifyResource('/locations/with-stats')).toBe('LOCATION');
    expect(classifyResource('/engagement/dashboard')).toBe('ENGAGEMENT');
  });

  it('falls back to SYSTEM', () => {
    expect(classifyResource('/data-import/stats')).toBe('SYSTEM');
    expect(classifyResource('/')).toBe('SYSTEM');
  });
});

describe('resource and patient ids', () => {
  it('extracts only UUID-shaped segments', () => {
    expect(extractResourceId('/patients/123')).toBeNull();
    expect(extractResourceId(`/patients/${PATIENT_ID}`)).toBe(PATIENT_ID);
  });

  it('takes the id only after the collection that decided the resource type', () => {
    expect(extractResourceId(`/locations/${PATIENT_ID}/timings`)).toBe(PATIENT_ID);
    expect(extractResourceId(`/patients/programs/${PATIENT_ID}`)).toBeNull();
    expect(extractResourceId(`/patients/risk/${PATIENT_ID}/current`)).toBeNull();
  });

  it('never records an id for auth, engagement or risk resources', () => {
    expect(extractResourceId(`/auth/users/${PATIENT_ID}/toggle-status`)).toBeNull();
    expect(extractResourceId(`/engagement/${PATIENT_ID}`)).toBeNull();
    expect(extractResourceId(`/risk/${PATIENT_ID}`)).toBeNull();
  });

  it('checks shape, not hex content', () => {
    expect(looksLikeUuid('zzzzzzzz-zzzz-zzzz-zzzz-zzzzzzzzzzzz')).toBe(true);
    expect(looksLikeUuid('3fa85f64571745 62b3fc2c963f66afa6aaa')).toBe(false);
  });

  it('requires exactly four hyphens', () => {
    expect(looksLikeUuid('3fa85f64-5717-4562-b3fc-2c963f66afa-')).toBe(false);
    expect(looksLikeUuid('3fa85f64-5717-4562-b3fc2c963f66afa6a')).toBe(false);
    expect(looksLikeUuid('-3fa85f64571-4562-b3fc-2c963f66afa6a')).toBe(true);
  });

  it('prefers the path, then the patient_id query parameter', () => {
    expect(extractPatientId(`/patients/${PATIENT_ID}`, { patient_id: 'ignored' })).toBe(PATIENT_ID);
    expect(extractPatientId('/audit/logs/phi', { patient_id: PATIENT_ID })).toBe(PATIENT_ID);
    expect(extractPatientId('/audit/logs/phi', { patient_id: '123' })).toBeNull();
    expect(extractPatientId('/engagement/dashboard', {})).toBeNull();
  });
});

describe('PHI and export flags', () => {
  it('matches whole path segments', () => {
    expect(isPhiPath('/engagement/dashboard')).toBe(true);
    expect(isPhiPath('/patients-archive')).toBe(false);
    expect(isPhiPath('/auth/login')).toBe(false);
  });

  it('flags an export only when it succeeded', () => {
    expect(isDataExport('/patients/export/high-risk', 200)).toBe(true);
    expect(isDataExport('/patients/export/high-risk', 500)).toBe(false);
    expect(isDataExport('/patients/all', 200)).toBe(false);
  });
});

describe('classifyRequest', () => {
  it('combines action, resource and id', () => {
    expect(classifyRequest('DELETE', `/patients/${PATIENT_ID}?reason=x`, 200)).toEqual({
      actionType: 'DELETE',
      resourceType: 'PATIENT',
      resourceId: PATIENT_ID,
    });
  });

  it('does not attribute a nested id to the outer resource', () => {
    expect(classifyRequest('PUT', `/patients/programs/${PATIENT_ID}`, 200)).toEqual({
      actionType: 'UPDATE',
      resourceType: 'PATIENT',
      resourceId: null,
    });
    expect(classifyRequest('PATCH', `/auth/users/${PATIENT_ID}/toggle-status`, 200)).toEqual({
      actionType: 'UPDATE',
      resourceType: 'AUTH',
      resourceId: null,
    });
  });
});

describe('clientIp', () => {
  it('takes the first forwarded hop, then X-Real-IP, then the socket', () => {
    expect(clientIp({ 'x-forwarded-for': '203.0.113.5, 10.0.0.1' }, '127.0.0.1')).toBe('203.0.113.5');
    expect(clientIp({ 'x-real-ip': '198.51.100.7' }, '127.0.0.1')).toBe('198.51.100.7');
    expect(clientIp({}, '127.0.0.1')).toBe('127.0.0.1');
  });
});
