import { PoolClient } from 'pg';
import { Portfolio } from '@/models';

/**
 * Portfolio Repository Interface
 * Every lookup is scoped to an owner
 */
export interface IPortfolioRepository {
  /**
   * Create a portfolio
   * @throws ConflictError when the owner already has a portfolio with this name
   */
  createPortfolio(ownerId: number, name: string, client?: PoolClient): Promise<Portfolio>;

  /**
   * Owner's portfolios ordered by id
   */
  findPortfoliosByOwner(ownerId: number): Promise<Portfolio[]>;

  /**
   * @param options.forUpdate - Lock the portfolio row until the transaction ends
   *   (requires client). Serializes ledger writes within the portfolio.
   * @returns the portfolio, or null if not found
   */
  findPortfolioByName(
    ownerId: number,
    name: string,
    options?: { forUpdate?: boolean },
    client?: PoolClient
  ): Promise<Portfolio | null>;

  /**
   * Delete the portfolio row
   * @returns whether a row was deleted
   */
  deletePortfolio(portfolioId: number, client?: PoolClient): Promise<boolean>;
}
