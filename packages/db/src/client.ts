// =============================================================================
// Attendwell: PostgreSQL client (postgres.js)
// =============================================================================

import postgres from 'postgres';

/** Custom type parsers registered on every pool. */
export type DbTypes = { date: string; numeric: number };

export type Sql = postgres.Sql<DbTypes>;
export type TransactionSql = postgres.TransactionSql<DbTypes>;

export interface CreateSqlOptions {
  /** Pool size. */
  max?: number;
}

/**
 * Create the process-wide connection pool. Call once at startup and pass the
 * handle to whatever needs it; nothing in the tree reaches for a global pool.
 *
 * Usage:
 *   const sql = createSql(config.databaseUrl, { max: config.dbPoolMax });
 *   const rows = await sql`SELECT 1`;
 */
export function createSql(databaseUrl: string, options: CreateSqlOptions = {}): Sql {
  return postgres(databaseUrl, {
    max: options.max ?? 20,
    idle_timeout: 30,
    connect_timeout: 10,
    // Prepared statements are disabled for PgBouncer transaction mode compatibility
    prepare: false,
    // Parse DATE columns as 'YYYY-MM-DD' strings to avoid timezone drift
    types: {
      date: {
        to: 1082,
        from: [1082],
        serialize: (x: string) => x,
        parse: (x: string) => x,
      },
      // NUMERIC columns hold hours and scores; every one fits a double
      numeric: {
        to: 1700,
        from: [1700],
        serialize: (x: number) => String(x),
        parse: (x: string) => Number(x),
      },
    },
    onnotice: () => {
      // NOTICE messages from migrations and RLS policies are noise
    },
  });
}

/**
 * Gracefully close all pool connections. Call during process shutdown.
 */
export async function closeDb(sql: Sql): Promise<void> {
  await sql.end({ timeout: 5 });
}
