// =============================================================================
// Attendwell API: Entry point
// =============================================================================

import { createSql } from '@attendwell/db';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { argon2Hasher } from './lib/passwords.js';
import { createPgStore } from './repositories/pg/index.js';
import { initSentry } from './sentry.js';

const config = loadConfig();
initSentry(config);

const store = createPgStore(createSql(config.databaseUrl, { max: config.dbPoolMax }));
const app = await buildApp({ config, store, hasher: argon2Hasher });

const shutdown = async (signal: string): Promise<void> => {
  app.log.info(`Received ${signal}. Shutting down gracefully…`);
  await app.close();
  await store.close();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
