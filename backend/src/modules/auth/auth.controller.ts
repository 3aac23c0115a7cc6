/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for the /auth endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 * - /auth/me handlers run behind the authenticate preHandler (see auth.routes.ts).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requestMeta } from '../../shared/http/request-meta';
import { requireVendor } from '../../shared/http/require-auth-context';
import type { VendorService } from '../vendors';

import { loginSchema, registerVendorSchema, updateVendorSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import { toAccessTokenResponse, toVendorProfile } from './auth.presenter';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly vendorService: VendorService,
  ) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerVendorSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const vendor = await this.vendorService.registerVendor({
      name: parsed.data.name,
      email: parsed.data.email,
      password: parsed.data.password,
      businessName: parsed.data.business_name,
      request: requestMeta(req),
    });

    return reply.status(201).send({
      message: 'Vendor registered successfully',
      vendor_id: vendor.id,
    });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { accessToken } = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      request: requestMeta(req),
    });

    return reply.status(200).send(toAccessTokenResponse(accessToken));
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    return reply.status(200).send(toVendorProfile(vendor));
  }

  async updateMe(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);

    const parsed = updateVendorSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const updated = await this.vendorService.updateVendor(
      vendor,
      { name: parsed.data.name, businessName: parsed.data.business_name },
      requestMeta(req),
    );

    return reply.status(200).send(toVendorProfile(updated));
  }
}
