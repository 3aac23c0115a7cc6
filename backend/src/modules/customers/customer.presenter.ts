/**
 * backend/src/modules/customers/customer.presenter.ts
 */

import type { Customer } from './customer.types';

export type CustomerResponse = {
  customer_id: string;
  vendor_id: string;
  name: string;
  email: string | null;
  phone: string | null;
  qr_code: string | null;
  created_at: string;
};

export function toCustomerResponse(customer: Customer): CustomerResponse {
  return {
    customer_id: customer.id,
    vendor_id: customer.vendorId,
    name: customer.name,
    email: customer.email,
    phone: customer.phone,
    qr_code: customer.qrCode,
    created_at: customer.createdAt.toISOString(),
  };
}
