/**
 * Security model
 * Static catalog row, matches the 'securities' table
 */
export interface Security {
  ticker: string;
  name: string;
  exchange: string;
  currency: string;
  country: string;
  isin: string;
}

/**
 * Daily close price
 * close is NUMERIC(12,6), returned as string for precision
 */
export interface Price {
  ticker: string;
  date: string; // YYYY-MM-DD
  close: string;
}
