/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Request validation for vendor registration, login and profile update.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Wire names are snake_case (business_name); services take camelCase.
 * - Email normalized to lowercase in service, not here.
 */

import { z } from 'zod';

const nameField = z.string().trim().min(1, 'Name is required').max(200);
const businessNameField = z.string().trim().min(1, 'Business name is required').max(200);

export const registerVendorSchema = z.object({
  name: nameField,
  email: z.string().email('Invalid email address'),
  password: z.string().min(6, 'Password must be at least 6 characters').max(200),
  business_name: businessNameField,
});

export type RegisterVendorInput = z.infer<typeof registerVendorSchema>;

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

/**
 * Only name and business_name are mutable. Unknown keys (email, password) are stripped.
 * `{}` is valid: the service treats it as a no-op.
 */
export const updateVendorSchema = z.object({
  name: nameField.optional(),
  business_name: businessNameField.optional(),
});

export type UpdateVendorInput = z.infer<typeof updateVendorSchema>;
