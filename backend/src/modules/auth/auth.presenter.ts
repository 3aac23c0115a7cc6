/**
 * src/modules/auth/auth.presenter.ts
 *
 * Shapes domain values into the snake_case wire format of the /auth endpoints.
 */

import type { Vendor } from '../vendors';
import type { IssuedAccessToken } from './token.service';

export type VendorProfileResponse = {
  vendor_id: string;
  name: string;
  email: string;
  business_name: string;
  created_at: string;
  updated_at: string;
};

export type AccessTokenResponse = {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
};

export function toVendorProfile(vendor: Vendor): VendorProfileResponse {
  return {
    vendor_id: vendor.id,
    name: vendor.name,
    email: vendor.email,
    business_name: vendor.businessName,
    created_at: vendor.createdAt.toISOString(),
    updated_at: vendor.updatedAt.toISOString(),
  };
}

export function toAccessTokenResponse(token: IssuedAccessToken): AccessTokenResponse {
  return {
    access_token: token.token,
    token_type: 'bearer',
    expires_in: token.expiresInSeconds,
  };
}
