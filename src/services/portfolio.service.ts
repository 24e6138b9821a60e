import { Portfolio, PortfolioView } from '@/models';
import { ERROR_CODES } from '@/constants/trading';
import { DB_QUERY_LIMITS } from '@/config/businessRules';
import { transaction } from '@/config/database';
import { ConflictError, NotFoundError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IMetrics } from '@/interfaces/IMetrics';
import {
  IUserRepository,
  IPortfolioRepository,
  IPositionRepository,
  ISecurityRepository,
} from '@/repositories/interfaces';

const logger = createLogger('PortfolioService');

/**
 * Portfolio Service
 * Portfolio registry: create, list, delete (cascading to the ledger)
 */
export class PortfolioService {
  constructor(
    private userRepo: IUserRepository,
    private portfolioRepo: IPortfolioRepository,
    private positionRepo: IPositionRepository,
    private securityRepo: ISecurityRepository,
    private metrics: IMetrics
  ) {}

  /**
   * Data for the portfolio page
   *
   * @param selected - Portfolio to show; defaults to the owner's first portfolio
   */
  async getPortfolioView(ownerId: number, selected?: string): Promise<PortfolioView> {
    await this.assertOwnerExists(ownerId);

    const portfolios = await this.portfolioRepo.findPortfoliosByOwner(ownerId);
    const portfolioNames = portfolios.map((p) => p.name);

    let current: Portfolio | undefined;
    if (selected !== undefined) {
      current = portfolios.find((p) => p.name === selected);
      if (!current) {
        throw new NotFoundError(
          `The portfolio '${selected}' doesn't exist.`,
          ERROR_CODES.UNKNOWN_PORTFOLIO
        );
      }
    } else {
      current = portfolios[0];
    }

    const positions = current ? await this.positionRepo.findCurrentEntries(current.id) : [];
    const securities = await this.securityRepo.findAllSecurities();

    return {
      selectedPortfolio: current?.name ?? '',
      portfolioNames,
      positions,
      securities,
    };
  }

  /**
   * AddPortfolio action
   */
  async addPortfolio(
    ownerId: number,
    name: string
  ): Promise<{ success: boolean; message: string; portfolio: Portfolio }> {
    await this.assertOwnerExists(ownerId);

    const existing = await this.portfolioRepo.findPortfolioByName(ownerId, name);
    if (existing) {
      logger.warn({ ownerId, name }, 'Portfolio rejected: duplicate name');
      throw new ConflictError(
        `The portfolio '${name}' already exists.`,
        ERROR_CODES.DUPLICATE_NAME
      );
    }

    const portfolio = await this.portfolioRepo.createPortfolio(ownerId, name);

    logger.info({ ownerId, portfolioId: portfolio.id, name }, 'Portfolio created');
    this.metrics.incrementCounter('portfolios_created_total');

    return {
      success: true,
      message: `The portfolio '${name}' has been added.`,
      portfolio,
    };
  }

  /**
   * DeletePortfolio action
   * Removes every ledger entry of the portfolio, then the portfolio itself,
   * in one transaction.
   */
  async deletePortfolio(
    ownerId: number,
    name: string
  ): Promise<{ success: boolean; message: string; deletedPositions: number }> {
    await this.assertOwnerExists(ownerId);

    const deletedPositions = await transaction(
      async (client) => {
        const portfolio = await this.portfolioRepo.findPortfolioByName(
          ownerId,
          name,
          { forUpdate: true },
          client
        );
        if (!portfolio) {
          throw new NotFoundError(
            `The portfolio '${name}' doesn't exist.`,
            ERROR_CODES.UNKNOWN_PORTFOLIO
          );
        }

        const removed = await this.positionRepo.deleteAllEntries(portfolio.id, client);
        await this.portfolioRepo.deletePortfolio(portfolio.id, client);
        return removed;
      },
      { retryOnConflict: DB_QUERY_LIMITS.CONFLICT_RETRIES }
    );

    logger.info({ ownerId, name, deletedPositions }, 'Portfolio deleted');
    this.metrics.incrementCounter('portfolios_deleted_total');

    return {
      success: true,
      message: `The portfolio '${name}' has been deleted.`,
      deletedPositions,
    };
  }

  private async assertOwnerExists(ownerId: number): Promise<void> {
    const user = await this.userRepo.findUserById(ownerId);
    if (!user) {
      throw new NotFoundError(`User with ID ${ownerId} not found`);
    }
  }
}
