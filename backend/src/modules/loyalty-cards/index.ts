/**
 * backend/src/modules/loyalty-cards/index.ts
 *
 * Public surface of the loyalty-cards module.
 */

export { LoyaltyCardService } from './loyalty-card.service';
export { LoyaltyCardErrors } from './loyalty-card.errors';
export { cardStatus } from './policies/card-state.policy';
export type { LoyaltyCard, CardStatus } from './loyalty-card.types';
export type { LoyaltyCardRepo } from './dal/loyalty-card.repo';
