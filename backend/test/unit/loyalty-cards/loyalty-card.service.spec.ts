import { describe, it, expect } from 'vitest';
import { randomUUID } from 'node:crypto';
import { LoyaltyCardService } from '../../../src/modules/loyalty-cards';
import type { Vendor } from '../../../src/modules/vendors';
import type { RequestMeta } from '../../../src/shared/http/request-meta';
import { logger } from '../../../src/shared/logger/logger';
import {
  InMemAuditRepo,
  InMemCustomerRepo,
  InMemLoyaltyCardRepo,
  InMemStore,
  InMemTransactor,
} from '../../helpers/in-memory-repos';
import { TestClock } from '../../helpers/test-clock';

/**
 * Simulates a concurrent request that wins the race: its write commits right
 * after the service has read the card, before the conditional update runs.
 */
class RacingCardRepo extends InMemLoyaltyCardRepo {
  private competingWrite: (() => Promise<unknown>) | null = null;

  raceNextRead(write: () => Promise<unknown>): void {
    this.competingWrite = write;
  }

  override async findById(cardId: string) {
    const card = await super.findById(cardId);
    const write = this.competingWrite;
    this.competingWrite = null;
    if (write) await write();
    return card;
  }
}

const request: RequestMeta = { requestId: 'req-1', ip: '127.0.0.1', userAgent: null };

async function setup(threshold: number) {
  const clock = new TestClock();
  const store = new InMemStore();
  const customerRepo = new InMemCustomerRepo(store);
  const cardRepo = new RacingCardRepo(store);
  const auditRepo = new InMemAuditRepo(store);

  const vendor: Vendor = {
    id: randomUUID(),
    email: 'cafe@example.com',
    name: 'Cafe',
    businessName: 'Cafe',
    createdAt: clock.now(),
    updatedAt: clock.now(),
  };

  const customer = await customerRepo.insertCustomer({
    id: randomUUID(),
    vendorId: vendor.id,
    name: 'Alice',
    email: null,
    phone: null,
    qrCode: 'qrcodes/customer.png',
    now: clock.now(),
  });

  const service = new LoyaltyCardService({
    cardRepo,
    customerRepo,
    auditRepo,
    transactor: new InMemTransactor(store),
    logger,
    now: clock.now,
  });

  const card = await service.createCard({
    vendor,
    customerId: customer.id,
    rewardThreshold: threshold,
    request,
  });

  return { store, cardRepo, auditRepo, clock, service, vendor, card };
}

describe('LoyaltyCardService under a lost race', () => {
  it('classifies a punch that lost to the punch reaching the threshold', async () => {
    const { store, cardRepo, clock, service, vendor, card } = await setup(1);
    cardRepo.raceNextRead(() => cardRepo.punchIfActive(card.id, vendor.id, clock.now()));

    await expect(service.punch(vendor, card.id, request)).rejects.toMatchObject({
      code: 'CONFLICT',
      message: 'Reward threshold reached, redeem before punching again',
    });
    expect(store.cards.get(card.id)?.punches).toBe(1);
  });

  it('classifies a redeem that lost to another redeem', async () => {
    const { store, cardRepo, clock, service, vendor, card } = await setup(1);
    store.cards.set(card.id, { ...card, punches: 1 });
    cardRepo.raceNextRead(() => cardRepo.redeemIfEligible(card.id, vendor.id, clock.now()));

    await expect(service.redeem(vendor, card.id, request)).rejects.toMatchObject({
      code: 'CONFLICT',
      message: 'Reward already claimed for this card',
    });
    expect(store.cards.get(card.id)?.rewardClaimed).toBe(true);
    expect(store.auditEvents.map((e) => e.action)).not.toContain('loyalty_card.redeemed');
  });
});

describe('LoyaltyCardService.listCards', () => {
  it('accepts its own id in any letter case as the vendor filter', async () => {
    const { service, vendor, card } = await setup(5);

    const cards = await service.listCards(vendor, vendor.id.toUpperCase());

    expect(cards.map((c) => c.id)).toEqual([card.id]);
  });
});
