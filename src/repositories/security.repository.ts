import { PoolClient } from 'pg';
import { query, runQuery } from '@/config/database';
import { Security } from '@/models';
import { ISecurityRepository } from './interfaces/ISecurityRepository';

const SECURITY_COLUMNS = 'ticker, name, exchange, currency, country, isin';

/**
 * Security Repository
 * Read-only queries over the security catalog
 */
export class SecurityRepository implements ISecurityRepository {
  async securityExists(ticker: string, client?: PoolClient): Promise<boolean> {
    const result = await runQuery<{ exists: boolean }>(
      client,
      'SELECT EXISTS (SELECT 1 FROM securities WHERE ticker = $1) AS exists',
      [ticker]
    );

    return result.rows[0]?.exists ?? false;
  }

  async findSecurityByTicker(ticker: string): Promise<Security | null> {
    const result = await query<Security>(
      `SELECT ${SECURITY_COLUMNS} FROM securities WHERE ticker = $1`,
      [ticker]
    );

    return result.rows[0] ?? null;
  }

  async findAllSecurities(): Promise<Security[]> {
    const result = await query<Security>(
      `SELECT ${SECURITY_COLUMNS} FROM securities ORDER BY ticker`
    );

    return result.rows;
  }
}
