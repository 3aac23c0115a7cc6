/**
 * backend/src/modules/vendors/vendor.types.ts
 *
 * WHY:
 * - Domain types for the Vendors module.
 * - A vendor is the tenant root: customers and loyalty cards hang off vendor.id.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - passwordHash never leaves VendorCredentials.
 */

export type VendorId = string;

export type Vendor = {
  id: VendorId;
  email: string;
  name: string;
  businessName: string;

  createdAt: Date;
  updatedAt: Date;
};

export type VendorCredentials = Vendor & {
  passwordHash: string;
};

/**
 * Field update set for PUT /auth/me.
 * Absent = leave unchanged. Both columns are NOT NULL, so clearing is not representable.
 */
export type VendorUpdateSet = {
  name?: string;
  businessName?: string;
};
