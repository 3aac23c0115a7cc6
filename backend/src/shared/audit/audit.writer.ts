/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so services don't repeat it on every audit call.
 * - withContext() returns a NEW immutable writer (e.g. after the vendor is known).
 *
 * RULES:
 * - No module types imported here.
 * - No business rules, no AppError.
 */

import type { AuditRepo } from './audit.repo';
import type { AuditAction, AuditContext, AuditMetadata } from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  vendorId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export class AuditWriter {
  private readonly repo: AuditRepo;
  private readonly context: Readonly<AuditContext>;

  constructor(repo: AuditRepo, context?: Partial<AuditContext>) {
    this.repo = repo;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  withContext(extra: Partial<AuditContext>): AuditWriter {
    return new AuditWriter(this.repo, { ...this.context, ...extra });
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.repo.append({
      ...this.context,
      action,
      metadata,
    });
  }
}
