import { z } from 'zod';
import Decimal from 'decimal.js';
import { TRADE_LIMITS } from '@/config/businessRules';
import { TRADE_SIDES } from '@/constants/trading';

const DECIMAL_PATTERN = new RegExp(`^\\d+(\\.\\d{1,${TRADE_LIMITS.PRICE_DECIMALS}})?$`);

/**
 * Per-share price, as a JSON number or a numeric string
 * Normalized to a decimal string so no float ever reaches the ledger
 */
export const priceSchema = z
  .union([z.number(), z.string().trim()], {
    errorMap: () => ({ message: 'Price must be a number' }),
  })
  .transform((value) => (typeof value === 'number' ? String(value) : value))
  .superRefine((value, ctx) => {
    if (!DECIMAL_PATTERN.test(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Price must be a decimal number with at most ${TRADE_LIMITS.PRICE_DECIMALS} decimals`,
      });
      return;
    }

    const price = new Decimal(value);
    if (price.lessThan(TRADE_LIMITS.MIN_PRICE) || price.greaterThan(TRADE_LIMITS.MAX_PRICE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Price must be between ${TRADE_LIMITS.MIN_PRICE} and ${TRADE_LIMITS.MAX_PRICE}`,
      });
    }
  });

export const tickerSchema = z
  .string({ required_error: 'Ticker is required' })
  .trim()
  .min(TRADE_LIMITS.MIN_TICKER_LENGTH, { message: 'Ticker is required' })
  .max(TRADE_LIMITS.MAX_TICKER_LENGTH, {
    message: `Ticker cannot exceed ${TRADE_LIMITS.MAX_TICKER_LENGTH} characters`,
  });

/**
 * Trade fields shared by add and update
 *
 * Form-shaped limits only. Whether the trade is admissible (weekend,
 * future date, oversell, back-dating) is decided by the trade validator,
 * so tradeDate stays a plain string here.
 */
const tradeFields = {
  side: z.enum([TRADE_SIDES.BUY, TRADE_SIDES.SELL], {
    errorMap: () => ({ message: 'Side must be "buy" or "sell"' }),
  }),
  // Numbers or numeric strings only; booleans and null are not coerced
  quantity: z
    .union([z.number(), z.string().trim()], {
      errorMap: () => ({ message: 'Quantity must be a number' }),
    })
    .pipe(
      z.coerce
        .number({ invalid_type_error: 'Quantity must be a number' })
        .int({ message: 'Quantity must be a whole number of shares' })
        .min(TRADE_LIMITS.MIN_QUANTITY, {
          message: `Quantity must be at least ${TRADE_LIMITS.MIN_QUANTITY}`,
        })
        .max(TRADE_LIMITS.MAX_QUANTITY, {
          message: `Quantity cannot exceed ${TRADE_LIMITS.MAX_QUANTITY}`,
        })
    ),
  price: priceSchema,
  tradeDate: z.string().trim().optional(),
  comments: z
    .string()
    .trim()
    .max(TRADE_LIMITS.MAX_COMMENTS_LENGTH, {
      message: `Comments cannot exceed ${TRADE_LIMITS.MAX_COMMENTS_LENGTH} characters`,
    })
    .optional(),
};

/**
 * POST /users/:userId/portfolios/:portfolioName/positions
 */
export const addPositionSchema = z.object({
  ticker: tickerSchema,
  ...tradeFields,
});

/**
 * PUT /users/:userId/portfolios/:portfolioName/positions/:ticker
 * The ticker comes from the path
 */
export const updatePositionSchema = z.object(tradeFields);

export type AddPositionDTO = z.infer<typeof addPositionSchema>;
export type UpdatePositionDTO = z.infer<typeof updatePositionSchema>;
