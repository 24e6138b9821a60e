/**
 * Dependency Container
 * Instantiates and wires all repositories and services
 *
 * This is the single source of truth for dependency injection.
 * All concrete implementations are created here and injected into services.
 */

// Repository implementations
import { UserRepository } from '@/repositories/user.repository';
import { SecurityRepository } from '@/repositories/security.repository';
import { PriceRepository } from '@/repositories/price.repository';
import { PortfolioRepository } from '@/repositories/portfolio.repository';
import { PositionRepository } from '@/repositories/position.repository';

// Service implementations
import { TradeValidator } from '@/services/tradeValidator';
import { PortfolioService } from '@/services/portfolio.service';
import { PositionService } from '@/services/position.service';
import { SecurityService } from '@/services/security.service';

import { metrics } from '@/adapters/metrics/MetricsFactory';

// ============================================================================
// REPOSITORIES
// ============================================================================

export const userRepository = new UserRepository();
export const securityRepository = new SecurityRepository();
export const priceRepository = new PriceRepository();
export const portfolioRepository = new PortfolioRepository();
export const positionRepository = new PositionRepository();

// ============================================================================
// SERVICES
// ============================================================================

/**
 * Trade Validator
 * Ledger admission rules, reads "today" from the system clock
 */
export const tradeValidator = new TradeValidator(securityRepository, positionRepository);

/**
 * Portfolio Service
 * Portfolio view, creation and deletion
 */
export const portfolioService = new PortfolioService(
  userRepository,
  portfolioRepository,
  positionRepository,
  securityRepository,
  metrics
);

/**
 * Position Service
 * Trades against the ledger
 */
export const positionService = new PositionService(
  userRepository,
  portfolioRepository,
  positionRepository,
  tradeValidator,
  metrics
);

/**
 * Security Service
 * Catalog and close prices
 */
export const securityService = new SecurityService(securityRepository, priceRepository);
