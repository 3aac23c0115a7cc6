/**
 * backend/src/modules/loyalty-cards/loyalty-card.module.ts
 *
 * Encapsulates Loyalty Cards module wiring. Reads customers through the
 * customers module's repo interface for card issuance checks.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Transactor } from '../../shared/db/transactor';
import type { AuthenticateHook } from '../auth/identity-resolver';
import type { CustomerRepo } from '../customers';

import type { LoyaltyCardRepo } from './dal/loyalty-card.repo';
import { LoyaltyCardService } from './loyalty-card.service';
import { LoyaltyCardController } from './loyalty-card.controller';
import { registerLoyaltyCardRoutes } from './loyalty-card.routes';

export type LoyaltyCardModule = ReturnType<typeof createLoyaltyCardModule>;

export function createLoyaltyCardModule(deps: {
  cardRepo: LoyaltyCardRepo;
  customerRepo: CustomerRepo;
  auditRepo: AuditRepo;
  transactor: Transactor;
  logger: Logger;
  now: () => Date;
  authenticate: AuthenticateHook;
}) {
  const cardService = new LoyaltyCardService({
    cardRepo: deps.cardRepo,
    customerRepo: deps.customerRepo,
    auditRepo: deps.auditRepo,
    transactor: deps.transactor,
    logger: deps.logger,
    now: deps.now,
  });

  const controller = new LoyaltyCardController(cardService);

  return {
    cardService,
    registerRoutes(app: FastifyInstance) {
      registerLoyaltyCardRoutes(app, controller, deps.authenticate);
    },
  };
}
