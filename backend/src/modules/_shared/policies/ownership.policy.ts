/**
 * backend/src/modules/_shared/policies/ownership.policy.ts
 *
 * WHY:
 * - Tenant isolation reduces to one predicate: the resource's vendor_id equals
 *   the acting vendor's id. Customers and loyalty cards both go through here.
 *
 * RULES:
 * - Pure functions only.
 * - The caller supplies the error, so each module keeps its own wording.
 */

import type { AppError } from '../../../shared/http/errors';

export type OwnershipActor = { id: string };
export type TenantScoped = { vendorId: string };

export function isOwnedBy(actor: OwnershipActor, resource: TenantScoped): boolean {
  return resource.vendorId === actor.id;
}

export function assertOwnedBy(
  actor: OwnershipActor,
  resource: TenantScoped,
  denied: () => AppError,
): void {
  if (!isOwnedBy(actor, resource)) {
    throw denied();
  }
}
