/**
 * backend/src/modules/customers/customer.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Existence is reported before ownership (404 before 403).
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export type CustomerAction = 'access' | 'update' | 'delete';

export const CustomerErrors = {
  invalidCustomerId(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid customer ID', meta);
  },

  customerNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Customer not found', meta);
  },

  notAuthorized(action: CustomerAction, meta?: AppErrorMeta) {
    return AppError.forbidden(`Not authorized to ${action} this customer`, meta);
  },

  noFieldsToUpdate(meta?: AppErrorMeta) {
    return AppError.validationError('No fields to update', meta);
  },
} as const;
