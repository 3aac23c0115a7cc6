/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns bearer-token failure semantics.
 * - All token failures are 401; `reason` in meta tells them apart in logs.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include the raw token in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export type TokenFailureReason = 'MISSING_BEARER' | 'EXPIRED_TOKEN' | 'MALFORMED_TOKEN' | 'MISSING_CLAIM';

export const AuthErrors = {
  /** No Authorization header, wrong scheme, or empty token. */
  authenticationRequired(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', { reason: 'MISSING_BEARER', ...meta });
  },

  expiredToken(meta?: AppErrorMeta) {
    return AppError.unauthorized('Token expired', { reason: 'EXPIRED_TOKEN', ...meta });
  },

  /** Bad signature, wrong algorithm, or not a JWT at all. */
  malformedToken(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid token', { reason: 'MALFORMED_TOKEN', ...meta });
  },

  missingClaim(claim: string, meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid token', { reason: 'MISSING_CLAIM', claim, ...meta });
  },
} as const;
