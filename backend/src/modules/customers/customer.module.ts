/**
 * backend/src/modules/customers/customer.module.ts
 *
 * WHY:
 * - Encapsulates Customers module wiring (service, controller, routes).
 *
 * RULES:
 * - No infra creation here (DI passes repo + QR store in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Transactor } from '../../shared/db/transactor';
import type { EnrollmentQrStore } from '../../shared/qr/enrollment-qr-store';
import type { AuthenticateHook } from '../auth/identity-resolver';

import type { CustomerRepo } from './dal/customer.repo';
import { CustomerService } from './customer.service';
import { CustomerController } from './customer.controller';
import { registerCustomerRoutes } from './customer.routes';

export type CustomerModule = ReturnType<typeof createCustomerModule>;

export function createCustomerModule(deps: {
  customerRepo: CustomerRepo;
  qrStore: EnrollmentQrStore;
  auditRepo: AuditRepo;
  transactor: Transactor;
  logger: Logger;
  now: () => Date;
  authenticate: AuthenticateHook;
}) {
  const customerService = new CustomerService({
    customerRepo: deps.customerRepo,
    qrStore: deps.qrStore,
    auditRepo: deps.auditRepo,
    transactor: deps.transactor,
    logger: deps.logger,
    now: deps.now,
  });

  const controller = new CustomerController(customerService);

  return {
    customerService,
    registerRoutes(app: FastifyInstance) {
      registerCustomerRoutes(app, controller, deps.authenticate);
    },
  };
}
