import { Price, Security } from '@/models';
import { ERROR_CODES } from '@/constants/trading';
import { NotFoundError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { ISecurityRepository, IPriceRepository } from '@/repositories/interfaces';
import { parseTradeDate } from '@/utils/tradeDate';

/**
 * Security Service
 * Catalog lookups and the daily close price store
 */
export class SecurityService {
  constructor(
    private securityRepo: ISecurityRepository,
    private priceRepo: IPriceRepository
  ) {}

  async listSecurities(): Promise<{ count: number; securities: Security[] }> {
    const securities = await this.securityRepo.findAllSecurities();
    return { count: securities.length, securities };
  }

  async getSecurity(ticker: string): Promise<Security> {
    const security = await this.securityRepo.findSecurityByTicker(ticker);
    if (!security) {
      throw unknownTicker(ticker);
    }
    return security;
  }

  /**
   * Newest closes first
   */
  async getPriceHistory(
    ticker: string,
    limit: number
  ): Promise<{ ticker: string; prices: Price[] }> {
    await this.getSecurity(ticker);

    const prices = await this.priceRepo.getPriceHistory(ticker, limit);
    return { ticker, prices };
  }

  /**
   * Store one (date, close) pair; recording the same day again replaces it
   */
  async recordClosePrice(
    ticker: string,
    date: string,
    close: string
  ): Promise<{ success: boolean; message: string; price: Price }> {
    await this.getSecurity(ticker);

    const day = parseTradeDate(date);
    if (day === null) {
      throw new ValidationError('The price date format is invalid.', { date }, ERROR_CODES.MALFORMED_DATE);
    }

    const price = await this.priceRepo.upsertClosePrice(ticker, day, close);

    logger.info({ ticker, date: day }, 'Close price recorded');

    return {
      success: true,
      message: `The close price of '${ticker}' on ${day} has been recorded.`,
      price,
    };
  }
}

function unknownTicker(ticker: string): NotFoundError {
  return new NotFoundError(
    `The ticker '${ticker}' doesn't exist in the database.`,
    ERROR_CODES.UNKNOWN_TICKER
  );
}
