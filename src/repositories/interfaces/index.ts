/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IUserRepository';
export * from './ISecurityRepository';
export * from './IPriceRepository';
export * from './IPortfolioRepository';
export * from './IPositionRepository';
