import { PoolClient } from 'pg';
import { query, runQuery } from '@/config/database';
import { Portfolio } from '@/models';
import { ERROR_CODES } from '@/constants/trading';
import { ConflictError } from '@/errors';
import { IPortfolioRepository } from './interfaces/IPortfolioRepository';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

/**
 * Portfolio Repository
 * Handles all database operations for portfolios
 */
export class PortfolioRepository implements IPortfolioRepository {
  /**
   * Create a portfolio
   * The (owner_id, name) constraint catches a concurrent insert of the same
   * name that slipped past the service's existence check.
   */
  async createPortfolio(ownerId: number, name: string, client?: PoolClient): Promise<Portfolio> {
    try {
      const result = await runQuery<Portfolio>(
        client,
        `
        INSERT INTO portfolios (owner_id, name)
        VALUES ($1, $2)
        RETURNING id, owner_id AS "ownerId", name
        `,
        [ownerId, name]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error(`Portfolio '${name}' was not stored`);
      }
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(
          `The portfolio '${name}' already exists.`,
          ERROR_CODES.DUPLICATE_NAME
        );
      }
      throw error;
    }
  }

  async findPortfoliosByOwner(ownerId: number): Promise<Portfolio[]> {
    const result = await query<Portfolio>(
      'SELECT id, owner_id AS "ownerId", name FROM portfolios WHERE owner_id = $1 ORDER BY id',
      [ownerId]
    );

    return result.rows;
  }

  async findPortfolioByName(
    ownerId: number,
    name: string,
    options: { forUpdate?: boolean } = {},
    client?: PoolClient
  ): Promise<Portfolio | null> {
    const result = await runQuery<Portfolio>(
      client,
      `
      SELECT id, owner_id AS "ownerId", name
      FROM portfolios
      WHERE owner_id = $1 AND name = $2
      ${options.forUpdate ? 'FOR UPDATE' : ''}
      `,
      [ownerId, name]
    );

    return result.rows[0] ?? null;
  }

  async deletePortfolio(portfolioId: number, client?: PoolClient): Promise<boolean> {
    const result = await runQuery(client, 'DELETE FROM portfolios WHERE id = $1', [portfolioId]);

    return (result.rowCount ?? 0) > 0;
  }
}
