/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require an authenticated vendor" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or token parsing.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { Vendor } from '../../modules/vendors/vendor.types';

/**
 * Controller guard: returns the vendor resolved by the identity gate.
 * A protected route without the gate fails closed with 401.
 */
export function requireVendor(req: FastifyRequest): Vendor {
  const vendor = req.authContext?.vendor;
  if (!vendor) throw AppError.unauthorized('Authentication required');
  return vendor;
}
