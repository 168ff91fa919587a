// =============================================================================
// Attendwell API: Weekly metrics scheduler
// A repeatable BullMQ job fires on WEEKLY_METRICS_CRON (Monday 06:00 UTC by
// default) and stores the just-finished week's metrics for every active
// organization.
// =============================================================================

import { Queue, Worker } from 'bullmq';
import { ROLES, previousWeekStart } from '@attendwell/shared';
import type { AppConfig } from '../config.js';
import type { DataStore } from '../repositories/types.js';
import {
  calculateWeeklyMetrics,
  type WeeklyJobDeps,
  type WeeklyJobResult,
} from '../services/weeklyMetrics.js';

export const WEEKLY_QUEUE_NAME = 'attendwell:weekly-metrics';
const TICK_JOB_ID = 'weekly-metrics-tick';

export interface RedisConnection {
  host: string;
  port: number;
  password?: string;
}

export function redisConnection(redisUrl: string): RedisConnection {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: Number(url.port || 6379),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
  };
}

export interface WeeklyTickResult {
  week_start_date: string;
  organizations: Array<{ organization_id: string } & WeeklyJobResult>;
  failed_organizations: string[];
}

/**
 * One scheduler tick: the previous week for each active organization, under
 * a system-admin tenancy context. An organization that fails is logged and
 * the rest still run.
 */
export async function runWeeklyTick(deps: WeeklyJobDeps): Promise<WeeklyTickResult> {
  const now = (deps.now ?? (() => new Date()))();
  const weekStart = previousWeekStart(now);
  const organizations = await deps.store.withSystem((repos) => repos.organizations.listActive());

  const result: WeeklyTickResult = { week_start_date: weekStart, organizations: [], failed_organizations: [] };

  for (const org of organizations) {
    try {
      const counts = await calculateWeeklyMetrics(
        deps,
        { role: ROLES.SUPERUSER, orgId: null },
        org.organization_id,
        weekStart,
        'scheduled',
      );
      result.organizations.push({ organization_id: org.organization_id, ...counts });
    } catch (err) {
      result.failed_organizations.push(org.organization_id);
      deps.log.error({ err, organization_id: org.organization_id, week_start_date: weekStart }, 'Weekly metrics failed for organization');
    }
  }

  deps.log.info(
    {
      week_start_date: weekStart,
      organizations: result.organizations.length,
      failed: result.failed_organizations.length,
    },
    'Weekly metrics tick complete',
  );
  return result;
}

export interface WeeklyScheduler {
  queue: Queue;
  worker: Worker;
}

export function startWeeklyMetricsScheduler(
  config: Pick<AppConfig, 'redisUrl' | 'weeklyMetricsCron'>,
  store: DataStore,
  log: WeeklyJobDeps['log'],
): WeeklyScheduler {
  const connection = redisConnection(config.redisUrl);

  const queue = new Queue(WEEKLY_QUEUE_NAME, {
    connection,
    defaultJobOptions: { removeOnComplete: true, removeOnFail: 100 },
  });

  // Same repeat pattern and jobId on every start: one schedule, not one per restart
  queue
    .add('weekly-tick', {}, { repeat: { pattern: config.weeklyMetricsCron }, jobId: TICK_JOB_ID })
    .catch((err: unknown) => {
      log.error({ err }, 'Could not register the weekly metrics schedule');
    });

  const worker = new Worker(
    WEEKLY_QUEUE_NAME,
    async () => {
      await runWeeklyTick({ store, log });
    },
    { connection, concurrency: 1 },
  );

  worker.on('failed', (_job, err) => {
    log.error({ err }, 'Weekly metrics tick failed');
  });

  return { queue, worker };
}
