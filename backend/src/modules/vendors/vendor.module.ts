/**
 * backend/src/modules/vendors/vendor.module.ts
 *
 * Support module: owns vendor persistence + registry service.
 * Its HTTP surface (/auth/*) lives in the auth module.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Transactor } from '../../shared/db/transactor';
import type { VendorRepo } from './dal/vendor.repo';
import { VendorService } from './vendor.service';

export type VendorModule = ReturnType<typeof createVendorModule>;

export function createVendorModule(deps: {
  vendorRepo: VendorRepo;
  passwordHasher: PasswordHasher;
  auditRepo: AuditRepo;
  transactor: Transactor;
  logger: Logger;
  now: () => Date;
}) {
  const vendorService = new VendorService(deps);

  return {
    vendorRepo: deps.vendorRepo,
    vendorService,
  };
}
