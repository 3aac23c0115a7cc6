/**
 * backend/src/modules/customers/customer.schemas.ts
 */

import { z } from 'zod';

export const customerIdParamsSchema = z.object({
  customerId: z.string().uuid(),
});

export const registerCustomerSchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().trim().email().nullish(),
  phone: z.string().trim().min(1).nullish(),
});

export const updateCustomerSchema = z.object({
  name: z.string().trim().min(1).optional(),
  email: z.string().trim().email().nullable().optional(),
  phone: z.string().trim().min(1).nullable().optional(),
});

export type RegisterCustomerInput = z.infer<typeof registerCustomerSchema>;
export type UpdateCustomerInput = z.infer<typeof updateCustomerSchema>;
