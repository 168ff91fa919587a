// =============================================================================
// Attendwell API: Sentry initialisation
// Called first thing in server.ts / worker.ts.
//
// • Only active when SENTRY_DSN is set (skipped in dev/test).
// • PHI scrubbing: strips Authorization headers, request bodies, and patient
//   identifiers from events before they leave the process.
// =============================================================================

import * as Sentry from '@sentry/node';
import type { AppConfig } from './config.js';

// Fields whose values must never appear in Sentry events
const SCRUB_KEYS = new Set([
  'password', 'password_hash', 'access_token', 'refresh_token',
  'authorization', 'cookie', 'email', 'phone', 'mr', 'full_name',
  'primary_therapist', 'admission_date', 'discharge_date',
]);

let enabled = false;

function scrubObject(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (SCRUB_KEYS.has(k.toLowerCase())) {
      out[k] = '[Filtered]';
    } else if (v && typeof v === 'object' && !Array.isArray(v)) {
      out[k] = scrubObject(Object.fromEntries(Object.entries(v)));
    } else {
      out[k] = v;
    }
  }
  return out;
}

export function initSentry(config: Pick<AppConfig, 'sentryDsn' | 'sentryRelease' | 'nodeEnv' | 'isProd'>): void {
  if (!config.sentryDsn) return;
  enabled = true;

  const sentryRelease = config.sentryRelease;
  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.nodeEnv,
    // Release is injected at build time by the deploy workflow
    ...(sentryRelease ? { release: sentryRelease } : {}),

    // 10% of traces in production
    tracesSampleRate: config.isProd ? 0.1 : 1.0,

    // Scrub PHI from all outgoing events
    beforeSend(event) {
      const request = event.request;
      if (request?.headers) {
        const headers: Record<string, string> = {};
        for (const [k, v] of Object.entries(request.headers)) {
          headers[k] = SCRUB_KEYS.has(k.toLowerCase()) ? '[Filtered]' : v;
        }
        request.headers = headers;
      }
      if (request?.data && typeof request.data === 'object') {
        request.data = scrubObject(Object.fromEntries(Object.entries(request.data)));
      }
      return event;
    },

    beforeBreadcrumb(breadcrumb) {
      // Drop HTTP breadcrumbs that contain auth headers
      if (
        breadcrumb.type === 'http' &&
        breadcrumb.data?.['url'] &&
        typeof breadcrumb.data['url'] === 'string' &&
        breadcrumb.data['url'].includes('/auth/')
      ) {
        return null;
      }
      return breadcrumb;
    },
  });
}

/** Capture an exception with an optional extra context map. */
export function captureException(
  err: unknown,
  context?: Record<string, unknown>,
): void {
  if (!enabled) return;
  Sentry.withScope((scope) => {
    if (context) scope.setContext('context', scrubObject(context));
    Sentry.captureException(err);
  });
}
