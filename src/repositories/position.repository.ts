import { PoolClient } from 'pg';
import { query, runQuery } from '@/config/database';
import { NewPosition, Position } from '@/models';
import { IPositionRepository } from './interfaces/IPositionRepository';

// Column aliases shared by every ledger query
// trade_date is rendered as text so node-pg never shifts it into local time
const POSITION_COLUMNS = `
  id,
  portfolio_id AS "portfolioId",
  ticker,
  quantity,
  price,
  side,
  to_char(trade_date, 'YYYY-MM-DD') AS "tradeDate",
  is_current AS "isCurrent",
  created_at AS "createdAt",
  comments
`;

/**
 * Position Repository
 * The trade ledger: append-mostly entries per (portfolio, ticker)
 */
export class PositionRepository implements IPositionRepository {
  async appendEntry(entry: NewPosition, client?: PoolClient): Promise<Position> {
    const result = await runQuery<Position>(
      client,
      `
      INSERT INTO positions (
        portfolio_id,
        ticker,
        quantity,
        price,
        side,
        trade_date,
        is_current,
        comments
      ) VALUES ($1, $2, $3, $4, $5, $6, TRUE, $7)
      RETURNING ${POSITION_COLUMNS}
      `,
      [
        entry.portfolioId,
        entry.ticker,
        entry.quantity,
        entry.price,
        entry.side,
        entry.tradeDate,
        entry.comments,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Ledger entry for ${entry.ticker} was not stored`);
    }
    return row;
  }

  async markNonCurrent(entryId: number, client?: PoolClient): Promise<void> {
    await runQuery(client, 'UPDATE positions SET is_current = FALSE WHERE id = $1', [entryId]);
  }

  async findCurrentEntry(
    portfolioId: number,
    ticker: string,
    client?: PoolClient
  ): Promise<Position | null> {
    const result = await runQuery<Position>(
      client,
      `
      SELECT ${POSITION_COLUMNS}
      FROM positions
      WHERE portfolio_id = $1 AND ticker = $2 AND is_current
      `,
      [portfolioId, ticker]
    );

    return result.rows[0] ?? null;
  }

  async findCurrentEntries(portfolioId: number): Promise<Position[]> {
    const result = await query<Position>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM positions
      WHERE portfolio_id = $1 AND is_current
      ORDER BY ticker
      `,
      [portfolioId]
    );

    return result.rows;
  }

  async findEntriesByTicker(portfolioId: number, ticker: string): Promise<Position[]> {
    const result = await query<Position>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM positions
      WHERE portfolio_id = $1 AND ticker = $2
      ORDER BY trade_date ASC, id ASC
      `,
      [portfolioId, ticker]
    );

    return result.rows;
  }

  /**
   * Net notional of the pair, summed in NUMERIC so no float rounding
   * reaches the oversell comparison
   */
  async getNetValue(
    portfolioId: number,
    ticker: string,
    client?: PoolClient
  ): Promise<string | null> {
    const result = await runQuery<{ entries: number; netValue: string | null }>(
      client,
      `
      SELECT
        COUNT(*)::int AS entries,
        SUM(
          CASE
            WHEN side = 'buy' THEN quantity * price
            WHEN side = 'sell' THEN -(quantity * price)
            ELSE 0
          END
        ) AS "netValue"
      FROM positions
      WHERE portfolio_id = $1 AND ticker = $2
      `,
      [portfolioId, ticker]
    );

    const row = result.rows[0];
    if (!row || row.entries === 0) return null;
    return row.netValue ?? '0';
  }

  async deleteEntriesByTicker(
    portfolioId: number,
    ticker: string,
    client?: PoolClient
  ): Promise<number> {
    const result = await runQuery(
      client,
      'DELETE FROM positions WHERE portfolio_id = $1 AND ticker = $2',
      [portfolioId, ticker]
    );

    return result.rowCount ?? 0;
  }

  async deleteAllEntries(portfolioId: number, client?: PoolClient): Promise<number> {
    const result = await runQuery(client, 'DELETE FROM positions WHERE portfolio_id = $1', [
      portfolioId,
    ]);

    return result.rowCount ?? 0;
  }
}
