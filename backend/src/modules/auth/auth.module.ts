/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring: token service, identity gate, login, /auth routes.
 * - Exposes `authenticate` so other modules can protect their routes with the same gate.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { VendorRepo, VendorService } from '../vendors';

import { TokenService, type JwtConfig } from './token.service';
import { IdentityResolver, createAuthenticateHook } from './identity-resolver';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  jwt: JwtConfig;
  vendorRepo: VendorRepo;
  vendorService: VendorService;
  tokenHasher: TokenHasher;
  rateLimiter: RateLimiter;
  auditRepo: AuditRepo;
  logger: Logger;
  now: () => Date;
}) {
  const tokenService = new TokenService(deps.jwt, deps.now);
  const identityResolver = new IdentityResolver({ tokenService, vendorRepo: deps.vendorRepo });
  const authenticate = createAuthenticateHook(identityResolver);

  const authService = new AuthService({
    vendorService: deps.vendorService,
    tokenService,
    tokenHasher: deps.tokenHasher,
    rateLimiter: deps.rateLimiter,
    auditRepo: deps.auditRepo,
    logger: deps.logger,
  });

  const controller = new AuthController(authService, deps.vendorService);

  return {
    tokenService,
    identityResolver,
    authenticate,
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller, authenticate);
    },
  };
}
