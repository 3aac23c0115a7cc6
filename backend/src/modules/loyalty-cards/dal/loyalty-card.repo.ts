/**
 * backend/src/modules/loyalty-cards/dal/loyalty-card.repo.ts
 *
 * WHY:
 * - Card persistence behind an interface (Kysely in production, in-memory in tests).
 *
 * RULES:
 * - No AppError, no policies.
 * - No transactions started here (service owns tx); withDb() binds a trx.
 * - Punch and redeem are single conditional UPDATE ... RETURNING statements:
 *   the state guard lives in the WHERE clause, so two concurrent requests
 *   cannot both pass it. undefined means "no row matched"; the service re-reads
 *   and classifies.
 * - insertCard returns null on loyalty_cards_vendor_customer_unique.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { LoyaltyCardsTable } from '../../../shared/db/db.schema';
import { isUniqueViolation } from '../../../shared/db/pg-errors';
import type { LoyaltyCard } from '../loyalty-card.types';

export type InsertCardParams = {
  id: string;
  vendorId: string;
  customerId: string;
  rewardThreshold: number;
  now: Date;
};

export interface LoyaltyCardRepo {
  withDb(db: DbExecutor): LoyaltyCardRepo;
  findById(cardId: string): Promise<LoyaltyCard | undefined>;
  findByVendorAndCustomer(vendorId: string, customerId: string): Promise<LoyaltyCard | undefined>;
  /** Newest first. */
  listByVendor(vendorId: string): Promise<LoyaltyCard[]>;
  insertCard(params: InsertCardParams): Promise<LoyaltyCard | null>;
  /** +1 punch when unclaimed and below threshold. */
  punchIfActive(cardId: string, vendorId: string, now: Date): Promise<LoyaltyCard | undefined>;
  /** reward_claimed = true when unclaimed and at/over threshold. */
  redeemIfEligible(cardId: string, vendorId: string, now: Date): Promise<LoyaltyCard | undefined>;
}

type CardRow = Selectable<LoyaltyCardsTable>;

function toLoyaltyCard(row: CardRow): LoyaltyCard {
  return {
    id: row.id,
    vendorId: row.vendor_id,
    customerId: row.customer_id,
    punches: row.punches,
    rewardThreshold: row.reward_threshold,
    rewardClaimed: row.reward_claimed,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyLoyaltyCardRepo implements LoyaltyCardRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): LoyaltyCardRepo {
    return new KyselyLoyaltyCardRepo(db);
  }

  async findById(cardId: string): Promise<LoyaltyCard | undefined> {
    const row = await this.db
      .selectFrom('loyalty_cards')
      .selectAll()
      .where('id', '=', cardId)
      .executeTakeFirst();

    return row ? toLoyaltyCard(row) : undefined;
  }

  async findByVendorAndCustomer(
    vendorId: string,
    customerId: string,
  ): Promise<LoyaltyCard | undefined> {
    const row = await this.db
      .selectFrom('loyalty_cards')
      .selectAll()
      .where('vendor_id', '=', vendorId)
      .where('customer_id', '=', customerId)
      .executeTakeFirst();

    return row ? toLoyaltyCard(row) : undefined;
  }

  async listByVendor(vendorId: string): Promise<LoyaltyCard[]> {
    const rows = await this.db
      .selectFrom('loyalty_cards')
      .selectAll()
      .where('vendor_id', '=', vendorId)
      .orderBy('created_at', 'desc')
      .orderBy('id', 'desc')
      .execute();

    return rows.map(toLoyaltyCard);
  }

  async insertCard(params: InsertCardParams): Promise<LoyaltyCard | null> {
    try {
      const row = await this.db
        .insertInto('loyalty_cards')
        .values({
          id: params.id,
          vendor_id: params.vendorId,
          customer_id: params.customerId,
          punches: 0,
          reward_threshold: params.rewardThreshold,
          reward_claimed: false,
          created_at: params.now,
          updated_at: params.now,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toLoyaltyCard(row);
    } catch (err) {
      if (isUniqueViolation(err, 'loyalty_cards_vendor_customer_unique')) return null;
      throw err;
    }
  }

  async punchIfActive(
    cardId: string,
    vendorId: string,
    now: Date,
  ): Promise<LoyaltyCard | undefined> {
    const row = await this.db
      .updateTable('loyalty_cards')
      .set((eb) => ({
        punches: eb('punches', '+', 1),
        updated_at: now,
      }))
      .where('id', '=', cardId)
      .where('vendor_id', '=', vendorId)
      .where('reward_claimed', '=', false)
      .whereRef('punches', '<', 'reward_threshold')
      .returningAll()
      .executeTakeFirst();

    return row ? toLoyaltyCard(row) : undefined;
  }

  async redeemIfEligible(
    cardId: string,
    vendorId: string,
    now: Date,
  ): Promise<LoyaltyCard | undefined> {
    const row = await this.db
      .updateTable('loyalty_cards')
      .set({ reward_claimed: true, updated_at: now })
      .where('id', '=', cardId)
      .where('vendor_id', '=', vendorId)
      .where('reward_claimed', '=', false)
      .whereRef('punches', '>=', 'reward_threshold')
      .returningAll()
      .executeTakeFirst();

    return row ? toLoyaltyCard(row) : undefined;
  }
}
