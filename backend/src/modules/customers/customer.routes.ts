/**
 * backend/src/modules/customers/customer.routes.ts
 *
 * All /customer routes are protected. `/customer/all` is registered before the
 * parametric route; Fastify prefers static segments either way.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthenticateHook } from '../auth/identity-resolver';
import type { CustomerController } from './customer.controller';

export function registerCustomerRoutes(
  app: FastifyInstance,
  controller: CustomerController,
  authenticate: AuthenticateHook,
) {
  const protectedRoute = { preHandler: authenticate };

  app.post('/customer/register', protectedRoute, controller.register.bind(controller));
  app.get('/customer/all', protectedRoute, controller.list.bind(controller));
  app.get('/customer/:customerId', protectedRoute, controller.get.bind(controller));
  app.put('/customer/:customerId', protectedRoute, controller.update.bind(controller));
  app.delete('/customer/:customerId', protectedRoute, controller.remove.bind(controller));
}
