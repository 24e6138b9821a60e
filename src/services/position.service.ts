import { PoolClient } from 'pg';
import { Portfolio, Position, PositionHistory, TradeCandidate, TradeIntent } from '@/models';
import { ERROR_CODES } from '@/constants/trading';
import { DB_QUERY_LIMITS } from '@/config/businessRules';
import { transaction } from '@/config/database';
import { NotFoundError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IMetrics } from '@/interfaces/IMetrics';
import {
  IUserRepository,
  IPortfolioRepository,
  IPositionRepository,
} from '@/repositories/interfaces';
import { TradeValidator, rejectionToError } from './tradeValidator';

const logger = createLogger('PositionService');

type TradeMode = 'add' | 'update';

/**
 * Position Service
 * Records trades in the ledger after validation
 *
 * Every trade runs in one transaction:
 * 1. lock the portfolio row (serializes trades within the portfolio)
 * 2. read the current entry and build the trade intent
 * 3. validate against the ledger through the same client
 * 4. flip the old current entry and append the new one
 * A transient conflict replays the whole transaction once.
 */
export class PositionService {
  constructor(
    private userRepo: IUserRepository,
    private portfolioRepo: IPortfolioRepository,
    private positionRepo: IPositionRepository,
    private tradeValidator: TradeValidator,
    private metrics: IMetrics
  ) {}

  /**
   * AddPosition action
   *
   * Opens the position when the ticker has no entries yet; otherwise the
   * trade follows the current entry exactly like an update.
   */
  async addPosition(
    ownerId: number,
    portfolioName: string,
    candidate: TradeCandidate
  ): Promise<{ success: boolean; message: string; position: Position }> {
    const position = await this.recordTrade(ownerId, portfolioName, candidate, 'add');

    return {
      success: true,
      message: `The ticker '${position.ticker}' has been added to the portfolio.`,
      position,
    };
  }

  /**
   * UpdatePosition action
   * Requires a current entry for the ticker
   */
  async updatePosition(
    ownerId: number,
    portfolioName: string,
    ticker: string,
    input: Omit<TradeCandidate, 'ticker'>
  ): Promise<{ success: boolean; message: string; position: Position }> {
    const position = await this.recordTrade(
      ownerId,
      portfolioName,
      { ...input, ticker },
      'update'
    );

    return {
      success: true,
      message: `The ticker '${position.ticker}' has been updated.`,
      position,
    };
  }

  /**
   * DeletePosition action
   * Removes every entry of the ticker in the portfolio
   */
  async deletePosition(
    ownerId: number,
    portfolioName: string,
    ticker: string
  ): Promise<{ success: boolean; message: string; deletedEntries: number }> {
    await this.assertOwnerExists(ownerId);
    const symbol = ticker.trim();

    const deletedEntries = await transaction(
      async (client) => {
        const portfolio = await this.lockPortfolio(ownerId, portfolioName, client);

        const removed = await this.positionRepo.deleteEntriesByTicker(portfolio.id, symbol, client);
        if (removed === 0) {
          throw new NotFoundError(
            `There are no items of ticker '${symbol}' in portfolio '${portfolioName}'.`,
            ERROR_CODES.NOT_FOUND
          );
        }
        return removed;
      },
      { retryOnConflict: DB_QUERY_LIMITS.CONFLICT_RETRIES }
    );

    logger.info({ ownerId, portfolioName, ticker: symbol, deletedEntries }, 'Position deleted');
    this.metrics.incrementCounter('positions_deleted_total');

    return {
      success: true,
      message: `The items of ticker '${symbol}' have been deleted from portfolio '${portfolioName}'.`,
      deletedEntries,
    };
  }

  /**
   * Every entry of a ticker, oldest first, with the resulting net value
   */
  async getPositionHistory(
    ownerId: number,
    portfolioName: string,
    ticker: string
  ): Promise<PositionHistory> {
    await this.assertOwnerExists(ownerId);
    const symbol = ticker.trim();

    const portfolio = await this.portfolioRepo.findPortfolioByName(ownerId, portfolioName);
    if (!portfolio) {
      throw unknownPortfolio(portfolioName);
    }

    const entries = await this.positionRepo.findEntriesByTicker(portfolio.id, symbol);
    const netValue = await this.positionRepo.getNetValue(portfolio.id, symbol);
    if (entries.length === 0 || netValue === null) {
      throw new NotFoundError(
        `There are no items of ticker '${symbol}' in portfolio '${portfolioName}'.`,
        ERROR_CODES.NOT_FOUND
      );
    }

    return { portfolio: portfolio.name, ticker: symbol, netValue, entries };
  }

  private async recordTrade(
    ownerId: number,
    portfolioName: string,
    candidate: TradeCandidate,
    mode: TradeMode
  ): Promise<Position> {
    await this.assertOwnerExists(ownerId);
    const ticker = candidate.ticker.trim();

    const stopTimer = this.metrics.startTimer('trade_admission_duration_ms', { mode });
    const position = await transaction(
      async (client) => {
        const portfolio = await this.lockPortfolio(ownerId, portfolioName, client);

        const current = await this.positionRepo.findCurrentEntry(portfolio.id, ticker, client);
        if (mode === 'update' && !current) {
          throw new NotFoundError(
            `There are no items of ticker '${ticker}' to update.`,
            ERROR_CODES.NOT_FOUND
          );
        }

        const intent: TradeIntent = current
          ? { kind: 'FOLLOW_ON_TRADE', lastEntry: current }
          : { kind: 'FIRST_TRADE' };

        const result = await this.tradeValidator.validate(
          portfolio,
          { ...candidate, ticker },
          intent,
          client
        );

        if (!result.ok) {
          logger.warn(
            { ownerId, portfolioId: portfolio.id, ticker, rejection: result.rejection },
            'Trade rejected'
          );
          this.metrics.incrementCounter('trades_rejected_total', 1, {
            reason: result.rejection.code,
          });
          throw rejectionToError(result.rejection);
        }

        if (current) {
          await this.positionRepo.markNonCurrent(current.id, client);
        }

        return await this.positionRepo.appendEntry(
          { portfolioId: portfolio.id, ...result.trade },
          client
        );
      },
      { retryOnConflict: DB_QUERY_LIMITS.CONFLICT_RETRIES }
    ).finally(stopTimer);

    logger.info(
      {
        ownerId,
        portfolioId: position.portfolioId,
        positionId: position.id,
        ticker: position.ticker,
        side: position.side,
        mode,
      },
      'Trade recorded'
    );
    this.metrics.incrementCounter('trades_recorded_total', 1, { side: position.side });

    return position;
  }

  private async lockPortfolio(
    ownerId: number,
    name: string,
    client: PoolClient
  ): Promise<Portfolio> {
    const portfolio = await this.portfolioRepo.findPortfolioByName(
      ownerId,
      name,
      { forUpdate: true },
      client
    );
    if (!portfolio) {
      throw unknownPortfolio(name);
    }
    return portfolio;
  }

  private async assertOwnerExists(ownerId: number): Promise<void> {
    const user = await this.userRepo.findUserById(ownerId);
    if (!user) {
      throw new NotFoundError(`User with ID ${ownerId} not found`);
    }
  }
}

function unknownPortfolio(name: string): NotFoundError {
  return new NotFoundError(`The portfolio '${name}' doesn't exist.`, ERROR_CODES.UNKNOWN_PORTFOLIO);
}
