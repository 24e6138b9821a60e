import { Price } from '@/models';

/**
 * Price Repository Interface
 * Daily close prices per security
 */
export interface IPriceRepository {
  /**
   * Store the close of one day, replacing an existing close for that day
   */
  upsertClosePrice(ticker: string, date: string, close: string): Promise<Price>;

  /**
   * Most recent closes first
   * @param limit - Maximum number of days returned
   */
  getPriceHistory(ticker: string, limit: number): Promise<Price[]>;
}
