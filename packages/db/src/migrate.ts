// =============================================================================
// Attendwell: Migration Runner
// Usage: npm run db:migrate (reads DATABASE_URL)
// =============================================================================

import { readdir, readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createSql, closeDb, type Sql } from './client.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'migrations');

async function ensureMigrationsTable(sql: Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      id          SERIAL      PRIMARY KEY,
      filename    TEXT        NOT NULL UNIQUE,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;
}

async function getAppliedMigrations(sql: Sql): Promise<Set<string>> {
  const rows = await sql<{ filename: string }[]>`
    SELECT filename FROM _migrations ORDER BY id
  `;
  return new Set(rows.map((r) => r.filename));
}

async function applyMigration(sql: Sql, filename: string, content: string): Promise<void> {
  console.log(`Applying migration: ${filename}`);
  // Multi-statement DDL needs unsafe (no prepared statements); the file and
  // its bookkeeping row commit together.
  await sql.begin(async (tx) => {
    await tx.unsafe(content);
    await tx`INSERT INTO _migrations (filename) VALUES (${filename})`;
  });
  console.log(`  ✓ Applied: ${filename}`);
}

export async function migrate(sql: Sql): Promise<number> {
  await ensureMigrationsTable(sql);
  const applied = await getAppliedMigrations(sql);

  const files = (await readdir(MIGRATIONS_DIR))
    .filter((f) => f.endsWith('.sql'))
    .sort(); // numeric prefixes give the order

  let count = 0;
  for (const filename of files) {
    if (applied.has(filename)) {
      console.log(`  Skipping (already applied): ${filename}`);
      continue;
    }
    const content = await readFile(join(MIGRATIONS_DIR, filename), 'utf-8');
    await applyMigration(sql, filename, content);
    count++;
  }
  return count;
}

const isEntryPoint = process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1];

if (isEntryPoint) {
  const databaseUrl = process.env['DATABASE_URL'];
  if (!databaseUrl) {
    console.error('DATABASE_URL environment variable is required');
    process.exit(1);
  }
  const sql = createSql(databaseUrl, { max: 1 });
  console.log('Attendwell: Database Migration Runner');
  console.log('======================================');
  void migrate(sql)
    .then(async (count) => {
      console.log(count === 0 ? '\nAll migrations are up to date.' : `\nApplied ${count} migration(s).`);
      await closeDb(sql);
    })
    .catch(async (err: unknown) => {
      console.error('Migration failed:', err);
      await closeDb(sql);
      process.exit(1);
    });
}
