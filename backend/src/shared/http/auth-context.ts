/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Every request carries an auth context; it starts empty.
 * - The identity gate (modules/auth/identity-resolver) fills in the vendor
 *   for protected routes before their handler runs.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context on every request.
 * 2. The `authenticate` preHandler (auth module) resolves the bearer token and
 *    writes the vendor here, or rejects the request.
 * 3. Controllers read it via requireVendor(req).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Vendor } from '../../modules/vendors/vendor.types';

export type AuthContext = {
  vendor: Vendor | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = { vendor: null };
    done();
  });
}
