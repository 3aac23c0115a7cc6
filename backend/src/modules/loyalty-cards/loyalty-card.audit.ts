/**
 * backend/src/modules/loyalty-cards/loyalty-card.audit.ts
 *
 * Typed audit helpers for card transitions. Call AFTER the transition is persisted.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { LoyaltyCard } from './loyalty-card.types';

export function auditCardCreated(writer: AuditWriter, card: LoyaltyCard): Promise<void> {
  return writer.append('loyalty_card.created', {
    cardId: card.id,
    customerId: card.customerId,
    rewardThreshold: card.rewardThreshold,
  });
}

export function auditCardPunched(writer: AuditWriter, card: LoyaltyCard): Promise<void> {
  return writer.append('loyalty_card.punched', {
    cardId: card.id,
    punches: card.punches,
    rewardThreshold: card.rewardThreshold,
  });
}

export function auditCardRedeemed(writer: AuditWriter, card: LoyaltyCard): Promise<void> {
  return writer.append('loyalty_card.redeemed', {
    cardId: card.id,
    customerId: card.customerId,
  });
}
