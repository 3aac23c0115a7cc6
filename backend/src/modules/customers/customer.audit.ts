/**
 * backend/src/modules/customers/customer.audit.ts
 *
 * Typed audit helpers for the Customers module. Call AFTER the action succeeds.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Customer, CustomerUpdateSet } from './customer.types';

export function auditCustomerRegistered(writer: AuditWriter, customer: Customer): Promise<void> {
  return writer.append('customer.registered', { customerId: customer.id });
}

export function auditCustomerUpdated(
  writer: AuditWriter,
  customer: Customer,
  set: CustomerUpdateSet,
): Promise<void> {
  return writer.append('customer.updated', {
    customerId: customer.id,
    fields: Object.entries(set)
      .filter(([, value]) => value !== undefined)
      .map(([field]) => field),
  });
}

export function auditCustomerDeleted(
  writer: AuditWriter,
  data: { customerId: string; deletedCards: number },
): Promise<void> {
  return writer.append('customer.deleted', data);
}
