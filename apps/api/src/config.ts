// =============================================================================
// Attendwell API: Environment configuration
// All env vars are validated at startup. Missing required vars cause a crash.
// =============================================================================

import { LIMITS } from '@attendwell/shared';

type Env = Record<string, string | undefined>;

export type NodeEnv = 'development' | 'production' | 'test';

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: NodeEnv;
  logLevel: string;
  corsOrigin: string[];

  databaseUrl: string;
  dbPoolMax: number;

  jwtSecret: string;
  jwtAccessExpiry: string;

  auditLoggingEnabled: boolean;
  auditRetentionMonths: number;

  redisUrl: string;
  weeklyMetricsCron: string;

  sentryDsn: string;
  sentryRelease: string;

  readonly isDev: boolean;
  readonly isProd: boolean;
}

function reader(env: Env) {
  function required(key: string): string {
    const value = env[key];
    if (!value) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
  }

  function optional(key: string, fallback: string): string {
    return env[key] ?? fallback;
  }

  function optionalBool(key: string, fallback: boolean): boolean {
    const val = env[key];
    if (val === undefined) return fallback;
    return val === 'true';
  }

  function optionalNumber(key: string, fallback: number): number {
    const val = env[key];
    if (val === undefined || val === '') return fallback;
    const parsed = Number(val);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Environment variable ${key} must be a number, got '${val}'`);
    }
    return parsed;
  }

  return { required, optional, optionalBool, optionalNumber };
}

function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

export function loadConfig(env: Env = process.env): AppConfig {
  const { required, optional, optionalBool, optionalNumber } = reader(env);
  const nodeEnv = parseNodeEnv(optional('NODE_ENV', 'development'));

  return {
    // Server
    port: optionalNumber('API_PORT', 8000),
    host: optional('API_HOST', '0.0.0.0'),
    nodeEnv,
    logLevel: optional('LOG_LEVEL', nodeEnv === 'development' ? 'debug' : 'info'),
    corsOrigin: optional('CORS_ORIGIN', 'http://localhost:5173')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),

    // Database
    databaseUrl: required('DATABASE_URL'),
    dbPoolMax: optionalNumber('DB_POOL_MAX', 20),

    // Auth
    jwtSecret: required('JWT_SECRET'),
    jwtAccessExpiry: optional('JWT_ACCESS_EXPIRY', '30m'),

    // Audit trail: off unless explicitly enabled
    auditLoggingEnabled: optionalBool('AUDIT_LOGGING_ENABLED', false),
    auditRetentionMonths: optionalNumber('AUDIT_RETENTION_MONTHS', LIMITS.AUDIT_RETENTION_MONTHS_DEFAULT),

    // Weekly metrics worker
    redisUrl: optional('REDIS_URL', 'redis://localhost:6379'),
    weeklyMetricsCron: optional('WEEKLY_METRICS_CRON', '0 6 * * 1'),

    // Observability
    sentryDsn: env['SENTRY_DSN'] ?? '',
    sentryRelease: env['SENTRY_RELEASE'] ?? '',

    get isDev(): boolean {
      return this.nodeEnv === 'development';
    },
    get isProd(): boolean {
      return this.nodeEnv === 'production';
    },
  };
}
