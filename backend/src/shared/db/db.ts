/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./db.schema.ts (kept in step with ./migrations).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './db.schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" repositories should accept.
 * - Works for both main DB and transactions (`trx`): Transaction<DB> extends Kysely<DB>.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
