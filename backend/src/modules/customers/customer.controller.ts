/**
 * backend/src/modules/customers/customer.controller.ts
 *
 * WHY:
 * - Maps HTTP → CustomerService for /customer/*.
 *
 * RULES:
 * - No DB access here.
 * - Validate params + body with Zod; the acting vendor comes from requireVendor(req).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requestMeta } from '../../shared/http/request-meta';
import { requireVendor } from '../../shared/http/require-auth-context';

import { CustomerErrors } from './customer.errors';
import {
  customerIdParamsSchema,
  registerCustomerSchema,
  updateCustomerSchema,
} from './customer.schemas';
import type { CustomerService } from './customer.service';
import { toCustomerResponse } from './customer.presenter';

function parseCustomerId(params: unknown): string {
  const parsed = customerIdParamsSchema.safeParse(params);
  if (!parsed.success) throw CustomerErrors.invalidCustomerId();
  return parsed.data.customerId;
}

export class CustomerController {
  constructor(private readonly customerService: CustomerService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);

    const parsed = registerCustomerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const customer = await this.customerService.registerCustomer({
      vendor,
      name: parsed.data.name,
      email: parsed.data.email,
      phone: parsed.data.phone,
      request: requestMeta(req),
    });

    return reply.status(201).send(toCustomerResponse(customer));
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    const customers = await this.customerService.listCustomers(vendor);
    return reply.status(200).send(customers.map(toCustomerResponse));
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    const customerId = parseCustomerId(req.params);

    const customer = await this.customerService.getCustomer(vendor, customerId);
    return reply.status(200).send(toCustomerResponse(customer));
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    const customerId = parseCustomerId(req.params);

    const parsed = updateCustomerSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const customer = await this.customerService.updateCustomer(
      vendor,
      customerId,
      parsed.data,
      requestMeta(req),
    );
    return reply.status(200).send(toCustomerResponse(customer));
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    const customerId = parseCustomerId(req.params);

    await this.customerService.deleteCustomer(vendor, customerId, requestMeta(req));
    return reply.status(200).send({ message: `Customer ${customerId} deleted successfully` });
  }
}
