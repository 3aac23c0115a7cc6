/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit persistence.
 * - Services call this (through AuditWriter) when a vendor did something meaningful.
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules, no AppError.
 * - Must work with both DB and transactions (DbExecutor): the audit row commits
 *   with the change it records.
 */

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert } from './audit.types';

export interface AuditRepo {
  /** Returns a repo bound to a different executor (e.g. a transaction). */
  withDb(db: DbExecutor): AuditRepo;
  append(event: AuditEventInsert): Promise<void>;
}

export class KyselyAuditRepo implements AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AuditRepo {
    return new KyselyAuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        vendor_id: event.vendorId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        // strips undefined / functions, guarantees a JSON document
        metadata: JSON.stringify(event.metadata ?? {}),
      })
      .execute();
  }
}
