import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { Logger } from 'pino';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. */
  max: number;
}

/**
 * postgres.js connection plus the typed Drizzle instance over it.
 *
 * `sql` is kept for schema bootstrap, health probes and `end()` at
 * shutdown. Server notices (e.g. "relation already exists, skipping")
 * go to the logger instead of stdout.
 */
export function createDbClient(databaseUrl: string, log: Logger, options: DbClientOptions) {
  const sql = postgres(databaseUrl, {
    max: options.max,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => {
      log.debug({ code: notice['code'], message: notice['message'] }, 'Postgres notice');
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];
