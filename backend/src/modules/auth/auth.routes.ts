/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 *
 * RULES:
 * - No business logic here.
 * - Protected routes declare `preHandler: authenticate`.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';
import type { AuthenticateHook } from './identity-resolver';

export function registerAuthRoutes(
  app: FastifyInstance,
  controller: AuthController,
  authenticate: AuthenticateHook,
) {
  app.post('/auth/register', controller.register.bind(controller));
  app.post('/auth/login', controller.login.bind(controller));

  app.get('/auth/me', { preHandler: authenticate }, controller.me.bind(controller));
  app.put('/auth/me', { preHandler: authenticate }, controller.updateMe.bind(controller));
}
