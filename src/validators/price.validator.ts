import { z } from 'zod';
import { PRICE_HISTORY_LIMITS } from '@/config/businessRules';
import { priceSchema } from './position.validator';

/**
 * POST /securities/:ticker/prices
 * The date is checked as a calendar day by the service
 */
export const recordPriceSchema = z.object({
  date: z.string({ required_error: 'Date is required' }).trim(),
  close: priceSchema,
});

export const priceHistoryQuerySchema = z.object({
  limit: z.coerce
    .number({ invalid_type_error: 'Limit must be a number' })
    .int()
    .min(1)
    .max(PRICE_HISTORY_LIMITS.MAX_LIMIT, {
      message: `Limit cannot exceed ${PRICE_HISTORY_LIMITS.MAX_LIMIT}`,
    })
    .default(PRICE_HISTORY_LIMITS.DEFAULT_LIMIT),
});

export type RecordPriceDTO = z.infer<typeof recordPriceSchema>;
