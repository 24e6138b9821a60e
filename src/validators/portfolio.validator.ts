import { z } from 'zod';
import { PORTFOLIO_LIMITS } from '@/config/businessRules';

/**
 * Owner id taken from the route (/users/:userId/...)
 */
export const userIdParamSchema = z.coerce
  .number({ invalid_type_error: 'User ID must be a number' })
  .int()
  .positive({ message: 'Invalid user ID' });

/**
 * Portfolio creation schema
 * Name is trimmed before the length check
 */
export const createPortfolioSchema = z.object({
  name: z
    .string({ required_error: 'Portfolio name is required' })
    .trim()
    .min(PORTFOLIO_LIMITS.MIN_NAME_LENGTH, {
      message: `Portfolio name must be at least ${PORTFOLIO_LIMITS.MIN_NAME_LENGTH} characters`,
    })
    .max(PORTFOLIO_LIMITS.MAX_NAME_LENGTH, {
      message: `Portfolio name cannot exceed ${PORTFOLIO_LIMITS.MAX_NAME_LENGTH} characters`,
    }),
});

/**
 * GET /users/:userId/portfolios?selected=
 */
export const portfolioViewQuerySchema = z.object({
  selected: z.string().trim().min(1).optional(),
});

export type CreatePortfolioDTO = z.infer<typeof createPortfolioSchema>;
