/**
 * backend/src/modules/loyalty-cards/loyalty-card.presenter.ts
 *
 * `status` is derived from the stored fields on every response.
 */

import { cardStatus } from './policies/card-state.policy';
import type { CardStatus, LoyaltyCard } from './loyalty-card.types';

export type LoyaltyCardResponse = {
  card_id: string;
  vendor_id: string;
  customer_id: string;
  punches: number;
  reward_threshold: number;
  reward_claimed: boolean;
  status: CardStatus;
  created_at: string;
  updated_at: string;
};

export function toLoyaltyCardResponse(card: LoyaltyCard): LoyaltyCardResponse {
  return {
    card_id: card.id,
    vendor_id: card.vendorId,
    customer_id: card.customerId,
    punches: card.punches,
    reward_threshold: card.rewardThreshold,
    reward_claimed: card.rewardClaimed,
    status: cardStatus(card),
    created_at: card.createdAt.toISOString(),
    updated_at: card.updatedAt.toISOString(),
  };
}
