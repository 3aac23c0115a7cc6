/**
 * src/modules/auth/token.service.ts
 *
 * WHY:
 * - Issues and validates the bearer tokens that bind a request to a vendor.
 * - Stateless: validity is proven by the HMAC signature plus the `exp` claim,
 *   re-checked against the clock on every use.
 *
 * RULES:
 * - Secret, algorithm and TTL come from AppConfig (built once at startup).
 * - Signature is verified before expiry (jsonwebtoken does both, in that order).
 * - There is no revocation: a leaked token is valid until it expires.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

import { AuthErrors } from './auth.errors';

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export type JwtConfig = {
  secret: string;
  algorithm: JwtAlgorithm;
  ttlMinutes: number;
};

export type AccessTokenClaims = {
  vendorId: string;
  email: string;
};

export type IssuedAccessToken = {
  token: string;
  expiresAt: Date;
  expiresInSeconds: number;
};

const ClaimsSchema = z.object({
  vendor_id: z.string().min(1),
  email: z.string(),
});

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class TokenService {
  constructor(
    private readonly config: JwtConfig,
    private readonly now: () => Date = () => new Date(),
  ) {}

  issue(vendorId: string, email: string): IssuedAccessToken {
    const iat = toEpochSeconds(this.now());
    const expiresInSeconds = this.config.ttlMinutes * 60;
    const exp = iat + expiresInSeconds;

    const token = jwt.sign({ vendor_id: vendorId, email, iat, exp }, this.config.secret, {
      algorithm: this.config.algorithm,
    });

    return { token, expiresAt: new Date(exp * 1000), expiresInSeconds };
  }

  validate(token: string): AccessTokenClaims {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, {
        algorithms: [this.config.algorithm],
        clockTimestamp: toEpochSeconds(this.now()),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw AuthErrors.expiredToken({ expiredAt: err.expiredAt.toISOString() });
      }
      throw AuthErrors.malformedToken();
    }

    if (typeof decoded === 'string') throw AuthErrors.malformedToken();

    const parsed = ClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      // first failing key in schema order: vendor_id before email
      const claim = parsed.error.issues[0]?.path[0];
      throw AuthErrors.missingClaim(claim === 'email' ? 'email' : 'vendor_id');
    }

    return { vendorId: parsed.data.vendor_id, email: parsed.data.email };
  }
}
