/**
 * Business Rules Configuration
 *
 * Limits applied to form-shaped input before it reaches the services.
 * The ledger rules themselves (weekends, oversell, back-dating) live in
 * the trade validator.
 */

/**
 * Portfolio name bounds, matching the varchar(25) column
 */
export const PORTFOLIO_LIMITS = {
  MIN_NAME_LENGTH: 3,
  MAX_NAME_LENGTH: 25,
} as const;

/**
 * Trade limits
 *
 * - QUANTITY: whole shares only
 * - PRICE: per-share price, NUMERIC(12,6) in the ledger
 * - COMMENTS: free text stored with the entry, varchar(140)
 */
export const TRADE_LIMITS = {
  MIN_TICKER_LENGTH: 1,
  MAX_TICKER_LENGTH: 20,
  MIN_QUANTITY: 1,
  MAX_QUANTITY: 100_000,
  MIN_PRICE: 1,
  MAX_PRICE: 1_000_000,
  PRICE_DECIMALS: 6,
  MAX_COMMENTS_LENGTH: 140,
} as const;

/**
 * Price history pagination
 */
export const PRICE_HISTORY_LIMITS = {
  DEFAULT_LIMIT: 30,
  MAX_LIMIT: 500,
} as const;

/**
 * Rate Limiting Configuration
 *
 * Trade and portfolio mutations get a stricter budget than reads.
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 100,
  },
  MUTATIONS: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 30,
  },
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /** Kills runaway statements before they starve the pool */
  STATEMENT_TIMEOUT_MS: 10_000,

  /** How many times a conflicting trade transaction is replayed */
  CONFLICT_RETRIES: 1,
} as const;

export type PortfolioLimits = typeof PORTFOLIO_LIMITS;
export type TradeLimits = typeof TRADE_LIMITS;
export type RateLimits = typeof RATE_LIMITS;
export type DBQueryLimits = typeof DB_QUERY_LIMITS;
