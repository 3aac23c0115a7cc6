/**
 * src/modules/auth/auth.audit.ts
 *
 * Typed audit helpers for login. Never include passwords or tokens.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditLoginSuccess(writer: AuditWriter, data: { vendorId: string }): Promise<void> {
  return writer.append('auth.login.success', { vendorId: data.vendorId });
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { emailKey: string; reason: string },
): Promise<void> {
  return writer.append('auth.login.failed', {
    emailKey: data.emailKey,
    reason: data.reason,
  });
}
