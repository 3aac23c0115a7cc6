/**
 * backend/src/modules/loyalty-cards/policies/card-state.policy.ts
 *
 * WHY:
 * - The card state machine in one place: status derivation + transition guards.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level LoyaltyCardErrors.
 * - Existence is checked before ownership, ownership before state.
 */

import type { Vendor } from '../../vendors';
import { assertOwnedBy } from '../../_shared/policies/ownership.policy';
import { LoyaltyCardErrors, type CardAction } from '../loyalty-card.errors';
import type { CardStatus, LoyaltyCard } from '../loyalty-card.types';

type CardState = Pick<LoyaltyCard, 'punches' | 'rewardThreshold' | 'rewardClaimed'>;

export function cardStatus(card: CardState): CardStatus {
  if (card.rewardClaimed) return 'REDEEMED';
  return card.punches >= card.rewardThreshold ? 'ELIGIBLE' : 'ACTIVE';
}

export function assertCardAccessible(
  card: LoyaltyCard | undefined,
  vendor: Vendor,
  action: CardAction,
): asserts card is LoyaltyCard {
  if (!card) {
    throw LoyaltyCardErrors.cardNotFound();
  }

  const cardId = card.id;
  assertOwnedBy(vendor, card, () => LoyaltyCardErrors.notAuthorized(action, { cardId }));
}

/** Only ACTIVE cards take a punch. A punch never redeems. */
export function assertCanPunch(card: LoyaltyCard): void {
  const status = cardStatus(card);
  if (status === 'REDEEMED') {
    throw LoyaltyCardErrors.punchAfterRedeem({ cardId: card.id });
  }
  if (status === 'ELIGIBLE') {
    throw LoyaltyCardErrors.thresholdReached({ cardId: card.id });
  }
}

/** Only ELIGIBLE cards redeem. REDEEMED is terminal. */
export function assertCanRedeem(card: LoyaltyCard): void {
  const status = cardStatus(card);
  if (status === 'REDEEMED') {
    throw LoyaltyCardErrors.alreadyRedeemed({ cardId: card.id });
  }
  if (status === 'ACTIVE') {
    throw LoyaltyCardErrors.notEnoughPunches({
      cardId: card.id,
      punches: card.punches,
      rewardThreshold: card.rewardThreshold,
    });
  }
}
