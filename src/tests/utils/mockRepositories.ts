/**
 * Mock Repository Factories
 * Helper functions to create mocked repository implementations for testing
 */

import {
  IUserRepository,
  ISecurityRepository,
  IPriceRepository,
  IPortfolioRepository,
  IPositionRepository,
} from '@/repositories/interfaces';
import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

/**
 * All methods are jest.fn() and can be configured with .mockResolvedValue()
 */
export function createMockUserRepository(): jest.Mocked<IUserRepository> {
  return {
    findUserById: jest.fn(),
  };
}

export function createMockSecurityRepository(): jest.Mocked<ISecurityRepository> {
  return {
    securityExists: jest.fn(),
    findSecurityByTicker: jest.fn(),
    findAllSecurities: jest.fn(),
  };
}

export function createMockPriceRepository(): jest.Mocked<IPriceRepository> {
  return {
    upsertClosePrice: jest.fn(),
    getPriceHistory: jest.fn(),
  };
}

export function createMockPortfolioRepository(): jest.Mocked<IPortfolioRepository> {
  return {
    createPortfolio: jest.fn(),
    findPortfoliosByOwner: jest.fn(),
    findPortfolioByName: jest.fn(),
    deletePortfolio: jest.fn(),
  };
}

export function createMockPositionRepository(): jest.Mocked<IPositionRepository> {
  return {
    appendEntry: jest.fn(),
    markNonCurrent: jest.fn(),
    findCurrentEntry: jest.fn(),
    findCurrentEntries: jest.fn(),
    findEntriesByTicker: jest.fn(),
    getNetValue: jest.fn(),
    deleteEntriesByTicker: jest.fn(),
    deleteAllEntries: jest.fn(),
  };
}

export function createMockMetrics(): jest.Mocked<IMetrics> {
  return {
    incrementCounter: jest.fn(),
    recordHistogram: jest.fn(),
    startTimer: jest.fn<() => void, [string, MetricDimensions?]>(() => jest.fn()),
    flush: jest.fn().mockResolvedValue(undefined),
  };
}
