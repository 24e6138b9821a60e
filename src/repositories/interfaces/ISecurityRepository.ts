import { PoolClient } from 'pg';
import { Security } from '@/models';

/**
 * Security Repository Interface
 * Read-only access to the security catalog
 */
export interface ISecurityRepository {
  /**
   * Whether the ticker is listed in the catalog
   * @param client - Joins the caller's transaction when given
   */
  securityExists(ticker: string, client?: PoolClient): Promise<boolean>;

  /**
   * @returns the catalog row, or null if the ticker is not listed
   */
  findSecurityByTicker(ticker: string): Promise<Security | null>;

  /**
   * Entire catalog ordered by ticker
   */
  findAllSecurities(): Promise<Security[]>;
}
