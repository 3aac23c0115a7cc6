/**
 * backend/src/modules/customers/customer.types.ts
 *
 * RULES:
 * - vendorId is set at registration and never changes.
 * - email / phone are nullable columns; null means "not provided".
 */

export type CustomerId = string;

export type Customer = {
  id: CustomerId;
  vendorId: string;
  name: string;
  email: string | null;
  phone: string | null;

  /** Reference to the stored enrollment QR artifact. */
  qrCode: string | null;

  createdAt: Date;
};

/**
 * Field update set for PUT /customer/:customerId.
 * Absent = leave unchanged; null = clear (email / phone only).
 */
export type CustomerUpdateSet = {
  name?: string;
  email?: string | null;
  phone?: string | null;
};
