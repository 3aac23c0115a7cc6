/**
 * backend/src/modules/vendors/vendor.audit.ts
 *
 * Typed audit helpers for the Vendors module.
 * Call these AFTER the action succeeds; never include passwords or tokens.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Vendor, VendorUpdateSet } from './vendor.types';

export function auditVendorRegistered(writer: AuditWriter, vendor: Vendor): Promise<void> {
  return writer.append('vendor.registered', {
    vendorId: vendor.id,
    email: vendor.email,
  });
}

export function auditVendorProfileUpdated(
  writer: AuditWriter,
  vendor: Vendor,
  set: VendorUpdateSet,
): Promise<void> {
  return writer.append('vendor.profile.updated', {
    vendorId: vendor.id,
    fields: Object.entries(set)
      .filter(([, value]) => value !== undefined)
      .map(([field]) => field),
  });
}
