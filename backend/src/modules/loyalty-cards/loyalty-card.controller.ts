/**
 * backend/src/modules/loyalty-cards/loyalty-card.controller.ts
 *
 * WHY:
 * - Maps HTTP → LoyaltyCardService for /loyaltyCard/*.
 *
 * RULES:
 * - No DB access here.
 * - Malformed ids are 400 before the service is called.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requestMeta } from '../../shared/http/request-meta';
import { requireVendor } from '../../shared/http/require-auth-context';

import { LoyaltyCardErrors } from './loyalty-card.errors';
import { cardIdParamsSchema, createCardSchema, listCardsQuerySchema } from './loyalty-card.schemas';
import type { LoyaltyCardService } from './loyalty-card.service';
import { toLoyaltyCardResponse } from './loyalty-card.presenter';

function parseCardId(params: unknown): string {
  const parsed = cardIdParamsSchema.safeParse(params);
  if (!parsed.success) throw LoyaltyCardErrors.invalidCardId();
  return parsed.data.cardId;
}

export class LoyaltyCardController {
  constructor(private readonly cardService: LoyaltyCardService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);

    const parsed = createCardSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const card = await this.cardService.createCard({
      vendor,
      customerId: parsed.data.customer_id,
      rewardThreshold: parsed.data.reward_threshold,
      request: requestMeta(req),
    });

    return reply.status(201).send(toLoyaltyCardResponse(card));
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);

    const parsed = listCardsQuerySchema.safeParse(req.query);
    if (!parsed.success) throw LoyaltyCardErrors.invalidVendorFilter();

    const cards = await this.cardService.listCards(vendor, parsed.data.vendor_id);
    return reply.status(200).send(cards.map(toLoyaltyCardResponse));
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    const cardId = parseCardId(req.params);

    const card = await this.cardService.getCard(vendor, cardId);
    return reply.status(200).send(toLoyaltyCardResponse(card));
  }

  async punch(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    const cardId = parseCardId(req.params);

    const card = await this.cardService.punch(vendor, cardId, requestMeta(req));
    return reply.status(200).send(toLoyaltyCardResponse(card));
  }

  async redeem(req: FastifyRequest, reply: FastifyReply) {
    const vendor = requireVendor(req);
    const cardId = parseCardId(req.params);

    const card = await this.cardService.redeem(vendor, cardId, requestMeta(req));
    return reply.status(200).send(toLoyaltyCardResponse(card));
  }
}
