/**
 * backend/src/modules/loyalty-cards/loyalty-card.service.ts
 *
 * WHY:
 * - Loyalty Card Engine: issue cards, punch, redeem, read.
 *
 * RULES:
 * - Existence (404) -> ownership (403) -> state guard, before any write.
 * - The write itself is a conditional update; if it matches nothing the card is
 *   re-read and the failure classified from its current state.
 * - Each write and its audit event share one transaction: a failed operation
 *   leaves the card unchanged.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { DbExecutor } from '../../shared/db/db';
import type { Transactor } from '../../shared/db/transactor';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestMeta } from '../../shared/http/request-meta';
import { isOwnedBy } from '../_shared/policies/ownership.policy';
import type { Vendor } from '../vendors';
import type { CustomerRepo } from '../customers';

import type { LoyaltyCardRepo } from './dal/loyalty-card.repo';
import { LoyaltyCardErrors, type CardAction } from './loyalty-card.errors';
import {
  assertCanPunch,
  assertCanRedeem,
  assertCardAccessible,
} from './policies/card-state.policy';
import { auditCardCreated, auditCardPunched, auditCardRedeemed } from './loyalty-card.audit';
import type { LoyaltyCard } from './loyalty-card.types';

export type CreateCardParams = {
  vendor: Vendor;
  customerId: string;
  rewardThreshold: number;
  request: RequestMeta;
};

export class LoyaltyCardService {
  constructor(
    private readonly deps: {
      cardRepo: LoyaltyCardRepo;
      customerRepo: CustomerRepo;
      auditRepo: AuditRepo;
      transactor: Transactor;
      logger: Logger;
      now: () => Date;
    },
  ) {}

  async createCard(params: CreateCardParams): Promise<LoyaltyCard> {
    const { vendor, customerId } = params;

    const customer = await this.deps.customerRepo.findById(customerId);
    if (!customer) throw LoyaltyCardErrors.customerNotFound({ customerId });
    if (!isOwnedBy(vendor, customer)) throw LoyaltyCardErrors.customerNotOwned({ customerId });

    // fast path; the unique constraint is what holds under concurrent requests
    const existing = await this.deps.cardRepo.findByVendorAndCustomer(vendor.id, customerId);
    if (existing) throw LoyaltyCardErrors.cardAlreadyExists({ cardId: existing.id });

    const card = await this.deps.transactor.transaction(async (trx) => {
      const inserted = await this.deps.cardRepo.withDb(trx).insertCard({
        id: randomUUID(),
        vendorId: vendor.id,
        customerId,
        rewardThreshold: params.rewardThreshold,
        now: this.deps.now(),
      });
      if (!inserted) throw LoyaltyCardErrors.cardAlreadyExists({ customerId });

      await auditCardCreated(this.auditFor(trx, params.request, vendor.id), inserted);
      return inserted;
    });

    this.deps.logger.info('loyalty_cards.create.success', {
      flow: 'loyalty_cards.create',
      requestId: params.request.requestId,
      vendorId: vendor.id,
      cardId: card.id,
      customerId,
    });

    return card;
  }

  async getCard(vendor: Vendor, cardId: string): Promise<LoyaltyCard> {
    return this.loadAccessible(vendor, cardId, 'access');
  }

  /**
   * Cards of the acting vendor, newest first.
   * A vendor filter is accepted only when it names the caller.
   */
  async listCards(vendor: Vendor, vendorFilter?: string): Promise<LoyaltyCard[]> {
    if (vendorFilter !== undefined && vendorFilter.toLowerCase() !== vendor.id.toLowerCase()) {
      throw LoyaltyCardErrors.vendorFilterForbidden({ vendorFilter });
    }

    return this.deps.cardRepo.listByVendor(vendor.id);
  }

  async punch(vendor: Vendor, cardId: string, request: RequestMeta): Promise<LoyaltyCard> {
    const card = await this.loadAccessible(vendor, cardId, 'punch');
    assertCanPunch(card);

    const updated = await this.deps.transactor.transaction(async (trx) => {
      const cardRepo = this.deps.cardRepo.withDb(trx);

      const punched = await cardRepo.punchIfActive(cardId, vendor.id, this.deps.now());
      if (!punched) {
        // lost a race: report against whatever state won
        const current = await cardRepo.findById(cardId);
        assertCardAccessible(current, vendor, 'punch');
        assertCanPunch(current);
        throw LoyaltyCardErrors.cardNotFound({ cardId });
      }

      await auditCardPunched(this.auditFor(trx, request, vendor.id), punched);
      return punched;
    });

    this.deps.logger.info('loyalty_cards.punch.success', {
      flow: 'loyalty_cards.punch',
      requestId: request.requestId,
      vendorId: vendor.id,
      cardId,
      punches: updated.punches,
      rewardThreshold: updated.rewardThreshold,
    });

    return updated;
  }

  async redeem(vendor: Vendor, cardId: string, request: RequestMeta): Promise<LoyaltyCard> {
    const card = await this.loadAccessible(vendor, cardId, 'redeem');
    assertCanRedeem(card);

    const updated = await this.deps.transactor.transaction(async (trx) => {
      const cardRepo = this.deps.cardRepo.withDb(trx);

      const redeemed = await cardRepo.redeemIfEligible(cardId, vendor.id, this.deps.now());
      if (!redeemed) {
        const current = await cardRepo.findById(cardId);
        assertCardAccessible(current, vendor, 'redeem');
        assertCanRedeem(current);
        throw LoyaltyCardErrors.cardNotFound({ cardId });
      }

      await auditCardRedeemed(this.auditFor(trx, request, vendor.id), redeemed);
      return redeemed;
    });

    this.deps.logger.info('loyalty_cards.redeem.success', {
      flow: 'loyalty_cards.redeem',
      requestId: request.requestId,
      vendorId: vendor.id,
      cardId,
    });

    return updated;
  }

  private async loadAccessible(
    vendor: Vendor,
    cardId: string,
    action: CardAction,
  ): Promise<LoyaltyCard> {
    const card = await this.deps.cardRepo.findById(cardId);
    assertCardAccessible(card, vendor, action);
    return card;
  }

  private auditFor(trx: DbExecutor, request: RequestMeta, vendorId: string): AuditWriter {
    return new AuditWriter(this.deps.auditRepo.withDb(trx), {
      vendorId,
      requestId: request.requestId,
      ip: request.ip,
      userAgent: request.userAgent,
    });
  }
}
