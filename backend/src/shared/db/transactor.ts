/**
 * backend/src/shared/db/transactor.ts
 *
 * WHY:
 * - Services own the transaction boundary; repos only accept an executor.
 * - A state change and the audit event that records it commit together or not at all.
 *
 * RULES:
 * - No nesting: callers never start a transaction inside `transaction()`.
 * - Repos are bound to the executor with `withDb(trx)`.
 */

import type { Db, DbExecutor } from './db';

export interface Transactor {
  transaction<T>(fn: (trx: DbExecutor) => Promise<T>): Promise<T>;
}

export class KyselyTransactor implements Transactor {
  constructor(private readonly db: Db) {}

  transaction<T>(fn: (trx: DbExecutor) => Promise<T>): Promise<T> {
    return this.db.transaction().execute(fn);
  }
}
