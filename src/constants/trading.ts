/**
 * Trade sides, as stored in positions.side
 */
export const TRADE_SIDES = {
  BUY: 'buy',
  SELL: 'sell',
} as const;

/**
 * Error codes returned in the `error.code` field of failed actions
 */
export const ERROR_CODES = {
  DUPLICATE_NAME: 'DUPLICATE_NAME',
  UNKNOWN_PORTFOLIO: 'UNKNOWN_PORTFOLIO',
  UNKNOWN_TICKER: 'UNKNOWN_TICKER',
  MALFORMED_DATE: 'MALFORMED_DATE',
  WEEKEND_TRADE: 'WEEKEND_TRADE',
  FUTURE_TRADE: 'FUTURE_TRADE',
  SELL_WITHOUT_HOLDINGS: 'SELL_WITHOUT_HOLDINGS',
  INSUFFICIENT_HOLDINGS: 'INSUFFICIENT_HOLDINGS',
  BACKDATED_TRADE: 'BACKDATED_TRADE',
  NOT_FOUND: 'NOT_FOUND',
} as const;

/**
 * Currency used in user-facing amounts. Multi-currency is not supported.
 */
export const DISPLAY_CURRENCY = 'USD';

// Type exports
export type TradeSide = (typeof TRADE_SIDES)[keyof typeof TRADE_SIDES];
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
