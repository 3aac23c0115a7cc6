/**
 * backend/src/modules/customers/policies/customer-access.policy.ts
 *
 * Pure access checks for a customer lookup: exists, then owned by the actor.
 */

import type { Vendor } from '../../vendors';
import { assertOwnedBy } from '../../_shared/policies/ownership.policy';
import { CustomerErrors, type CustomerAction } from '../customer.errors';
import type { Customer } from '../customer.types';

export function assertCustomerAccessible(
  customer: Customer | undefined,
  vendor: Vendor,
  action: CustomerAction,
): asserts customer is Customer {
  if (!customer) {
    throw CustomerErrors.customerNotFound();
  }

  const customerId = customer.id;
  assertOwnedBy(vendor, customer, () => CustomerErrors.notAuthorized(action, { customerId }));
}
