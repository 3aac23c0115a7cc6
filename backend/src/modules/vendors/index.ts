/**
 * backend/src/modules/vendors/index.ts
 *
 * Public surface of the vendors module. Other modules import from here,
 * not from /dal.
 */

export { VendorService } from './vendor.service';
export { VendorErrors } from './vendor.errors';
export type { Vendor, VendorCredentials, VendorUpdateSet } from './vendor.types';
export type { VendorRepo } from './dal/vendor.repo';
