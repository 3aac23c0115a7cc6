/**
 * backend/src/modules/vendors/vendor.errors.ts
 *
 * SECURITY:
 * - Login failures never reveal whether the email exists (single generic error).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const VendorErrors = {
  emailAlreadyRegistered(meta?: AppErrorMeta) {
    return AppError.conflict('Email already registered', meta);
  },

  /** Unknown email OR wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  vendorNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Vendor not found', meta);
  },
} as const;
