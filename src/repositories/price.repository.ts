import { query } from '@/config/database';
import { Price } from '@/models';
import { IPriceRepository } from './interfaces/IPriceRepository';

/**
 * Price Repository
 * Daily close prices, one row per (ticker, date)
 */
export class PriceRepository implements IPriceRepository {
  async upsertClosePrice(ticker: string, date: string, close: string): Promise<Price> {
    const result = await query<Price>(
      `
      INSERT INTO prices (ticker, date, close)
      VALUES ($1, $2, $3)
      ON CONFLICT (ticker, date) DO UPDATE SET close = EXCLUDED.close
      RETURNING
        ticker,
        to_char(date, 'YYYY-MM-DD') AS date,
        close
      `,
      [ticker, date, close]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Close price for ${ticker} on ${date} was not stored`);
    }
    return row;
  }

  async getPriceHistory(ticker: string, limit: number): Promise<Price[]> {
    const result = await query<Price>(
      `
      SELECT
        ticker,
        to_char(date, 'YYYY-MM-DD') AS date,
        close
      FROM prices
      WHERE ticker = $1
      ORDER BY date DESC
      LIMIT $2
      `,
      [ticker, limit]
    );

    return result.rows;
  }
}
