/**
 * backend/src/modules/loyalty-cards/loyalty-card.schemas.ts
 */

import { z } from 'zod';

const PG_INT_MAX = 2_147_483_647;

export const cardIdParamsSchema = z.object({
  cardId: z.string().uuid(),
});

export const createCardSchema = z.object({
  customer_id: z.string().uuid(),
  reward_threshold: z.number().int().positive().max(PG_INT_MAX),
});

export const listCardsQuerySchema = z.object({
  vendor_id: z.string().uuid().optional(),
});

export type CreateCardInput = z.infer<typeof createCardSchema>;
