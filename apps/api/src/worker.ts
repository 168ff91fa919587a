// =============================================================================
// Attendwell API: Worker entrypoint
// Run separately from the HTTP server:
//   tsx src/worker.ts
//
// Starts the weekly metrics scheduler (BullMQ repeatable job).
// =============================================================================

import { pino } from 'pino';
import { createSql } from '@attendwell/db';
import { loadConfig } from './config.js';
import { createPgStore } from './repositories/pg/index.js';
import { captureException, initSentry } from './sentry.js';
import { startWeeklyMetricsScheduler } from './workers/weekly-metrics.js';

const config = loadConfig();
initSentry(config);

const log = pino({
  name: 'worker',
  level: config.logLevel,
  ...(config.isDev
    ? { transport: { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } } }
    : {}),
});

log.info({ redis: new URL(config.redisUrl).host, cron: config.weeklyMetricsCron }, 'Starting worker process');

const store = createPgStore(createSql(config.databaseUrl, { max: 5 }));
const scheduler = startWeeklyMetricsScheduler(config, store, log);

// Graceful shutdown
const shutdown = async (signal: string): Promise<void> => {
  log.info({ signal }, 'Shutting down');
  await Promise.all([scheduler.worker.close(), scheduler.queue.close()]);
  await store.close();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('uncaughtException', (err) => {
  log.error({ err }, 'Uncaught exception');
  captureException(err);
  void shutdown('uncaughtException');
});
process.on('unhandledRejection', (reason) => {
  log.error({ err: reason }, 'Unhandled rejection');
  captureException(reason);
  void shutdown('unhandledRejection');
});

log.info('Worker ready');
