/**
 * src/modules/auth/identity-resolver.ts
 *
 * WHY:
 * - The single gate every protected request passes: bearer token -> Vendor.
 * - Runs as a route preHandler, so a rejected request never reaches its handler.
 *
 * FAILURES:
 * - 401: no/invalid/expired token (AuthErrors).
 * - 404: token is valid but the vendor record is gone (VendorErrors.vendorNotFound).
 */

import type { FastifyRequest } from 'fastify';
import { z } from 'zod';

import { VendorErrors, type Vendor, type VendorRepo } from '../vendors';
import { AuthErrors } from './auth.errors';
import type { TokenService } from './token.service';

const VendorIdSchema = z.string().uuid();

/**
 * Extracts the token from `Authorization: Bearer <token>`.
 * The scheme is case-insensitive; anything else yields null.
 */
export function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const match = /^Bearer\s+(\S+)\s*$/i.exec(header.trim());
  return match?.[1] ?? null;
}

export class IdentityResolver {
  constructor(
    private readonly deps: {
      tokenService: TokenService;
      vendorRepo: VendorRepo;
    },
  ) {}

  async resolve(authorization: string | undefined): Promise<Vendor> {
    const token = parseBearerToken(authorization);
    if (!token) throw AuthErrors.authenticationRequired();

    const claims = this.deps.tokenService.validate(token);

    // A well-signed token can still name an id that cannot exist.
    if (!VendorIdSchema.safeParse(claims.vendorId).success) {
      throw VendorErrors.vendorNotFound({ vendorId: claims.vendorId });
    }

    const vendor = await this.deps.vendorRepo.findById(claims.vendorId);
    if (!vendor) throw VendorErrors.vendorNotFound({ vendorId: claims.vendorId });

    return vendor;
  }
}

export type AuthenticateHook = (req: FastifyRequest) => Promise<void>;

/**
 * Fastify preHandler for protected routes.
 * Populates req.authContext.vendor or throws (error-handler maps to 401/404).
 */
export function createAuthenticateHook(resolver: IdentityResolver): AuthenticateHook {
  return async (req: FastifyRequest) => {
    req.authContext.vendor = await resolver.resolve(req.headers.authorization);
  };
}
