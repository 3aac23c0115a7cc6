/**
 * backend/src/modules/loyalty-cards/loyalty-card.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - State violations: CONFLICT when the card is past the step (claimed / threshold reached),
 *   INSUFFICIENT_STATE when it has not reached it yet.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export type CardAction = 'access' | 'punch' | 'redeem';

const NOT_AUTHORIZED: Record<CardAction, string> = {
  access: 'Not authorized to access this loyalty card',
  punch: 'Not authorized to punch this card',
  redeem: 'Not authorized to redeem this card',
};

export const LoyaltyCardErrors = {
  invalidCardId(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid loyalty card ID format', meta);
  },

  invalidVendorFilter(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid vendor_id format', meta);
  },

  vendorFilterForbidden(meta?: AppErrorMeta) {
    return AppError.forbidden("Not authorized to view this vendor's cards", meta);
  },

  cardNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Loyalty card not found', meta);
  },

  notAuthorized(action: CardAction, meta?: AppErrorMeta) {
    return AppError.forbidden(NOT_AUTHORIZED[action], meta);
  },

  customerNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Customer not found', meta);
  },

  customerNotOwned(meta?: AppErrorMeta) {
    return AppError.forbidden('Not authorized to issue a card for this customer', meta);
  },

  cardAlreadyExists(meta?: AppErrorMeta) {
    return AppError.conflict('Loyalty card already exists for this customer', meta);
  },

  punchAfterRedeem(meta?: AppErrorMeta) {
    return AppError.conflict('Reward already claimed, cannot add more punches', meta);
  },

  thresholdReached(meta?: AppErrorMeta) {
    return AppError.conflict('Reward threshold reached, redeem before punching again', meta);
  },

  alreadyRedeemed(meta?: AppErrorMeta) {
    return AppError.conflict('Reward already claimed for this card', meta);
  },

  notEnoughPunches(meta?: AppErrorMeta) {
    return AppError.insufficientState('Not enough punches to redeem reward', meta);
  },
} as const;
