/**
 * backend/src/modules/loyalty-cards/loyalty-card.types.ts
 *
 * WHY:
 * - A card tracks one customer's punches toward one reward with one vendor.
 *
 * STATE MACHINE (derived, never stored):
 * - ACTIVE    punches < rewardThreshold, unclaimed
 * - ELIGIBLE  punches >= rewardThreshold, unclaimed
 * - REDEEMED  rewardClaimed = true (terminal)
 *
 * Transitions: punch ACTIVE -> ACTIVE | ELIGIBLE; redeem ELIGIBLE -> REDEEMED.
 */

export type LoyaltyCardId = string;

export type CardStatus = 'ACTIVE' | 'ELIGIBLE' | 'REDEEMED';

export type LoyaltyCard = {
  id: LoyaltyCardId;
  vendorId: string;
  customerId: string;

  punches: number;
  rewardThreshold: number;
  rewardClaimed: boolean;

  createdAt: Date;
  updatedAt: Date;
};
