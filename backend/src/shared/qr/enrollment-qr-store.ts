/**
 * backend/src/shared/qr/enrollment-qr-store.ts
 *
 * WHY:
 * - Customer enrollment produces a QR artifact the vendor prints or shows at the till.
 * - Rendering + storage are I/O concerns; services depend on this port only.
 *
 * CONTRACT:
 * - The QR encodes `<customerId>:<vendorId>`.
 * - create() returns an opaque reference that is stored on the customer record.
 * - remove() is idempotent: removing a missing artifact is not an error.
 */

export type EnrollmentQrInput = {
  customerId: string;
  vendorId: string;
};

export interface EnrollmentQrStore {
  create(input: EnrollmentQrInput): Promise<string>;
  remove(reference: string): Promise<void>;
}

export function enrollmentPayload(input: EnrollmentQrInput): string {
  return `${input.customerId}:${input.vendorId}`;
}
