import { PoolClient } from 'pg';
import { NewPosition, Position } from '@/models';

/**
 * Position Repository Interface (the trade ledger)
 */
export interface IPositionRepository {
  /**
   * Insert a ledger entry as the current entry of its (portfolio, ticker)
   */
  appendEntry(entry: NewPosition, client?: PoolClient): Promise<Position>;

  /**
   * Flip is_current to false; the entry otherwise stays untouched
   */
  markNonCurrent(entryId: number, client?: PoolClient): Promise<void>;

  /**
   * @returns the current entry of the pair, or null when nothing is recorded
   */
  findCurrentEntry(
    portfolioId: number,
    ticker: string,
    client?: PoolClient
  ): Promise<Position | null>;

  /**
   * Current entries of every ticker in the portfolio, ordered by ticker
   */
  findCurrentEntries(portfolioId: number): Promise<Position[]>;

  /**
   * Whole history of the pair, oldest first
   */
  findEntriesByTicker(portfolioId: number, ticker: string): Promise<Position[]>;

  /**
   * Σ(quantity × price) of buys minus Σ(quantity × price) of sells over every
   * entry of the pair, current and historical
   * @returns decimal string, or null when the pair has no entries
   */
  getNetValue(portfolioId: number, ticker: string, client?: PoolClient): Promise<string | null>;

  /**
   * @returns number of deleted entries
   */
  deleteEntriesByTicker(portfolioId: number, ticker: string, client?: PoolClient): Promise<number>;

  /**
   * @returns number of deleted entries
   */
  deleteAllEntries(portfolioId: number, client?: PoolClient): Promise<number>;
}
