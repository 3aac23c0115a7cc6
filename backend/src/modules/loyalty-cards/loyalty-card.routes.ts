/**
 * backend/src/modules/loyalty-cards/loyalty-card.routes.ts
 *
 * All routes are protected. The server runs with ignoreTrailingSlash, so
 * `/loyaltyCard/` and `/loyaltyCard` are the same route.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthenticateHook } from '../auth/identity-resolver';
import type { LoyaltyCardController } from './loyalty-card.controller';

export function registerLoyaltyCardRoutes(
  app: FastifyInstance,
  controller: LoyaltyCardController,
  authenticate: AuthenticateHook,
) {
  const protectedRoute = { preHandler: authenticate };

  app.post('/loyaltyCard/', protectedRoute, controller.create.bind(controller));
  app.get('/loyaltyCard/', protectedRoute, controller.list.bind(controller));
  app.get('/loyaltyCard/:cardId', protectedRoute, controller.get.bind(controller));
  app.put('/loyaltyCard/:cardId/punch', protectedRoute, controller.punch.bind(controller));
  app.put('/loyaltyCard/:cardId/redeem', protectedRoute, controller.redeem.bind(controller));
}
