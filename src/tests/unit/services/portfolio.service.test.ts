import { PortfolioService } from '@/services/portfolio.service';
import {
  createMockUserRepository,
  createMockPortfolioRepository,
  createMockPositionRepository,
  createMockSecurityRepository,
  createMockMetrics,
} from '@/tests/utils/mockRepositories';
import { abcSecurity, growthPortfolio, makePosition, owner } from '@/tests/utils/fixtures';
import {
  IUserRepository,
  IPortfolioRepository,
  IPositionRepository,
  ISecurityRepository,
} from '@/repositories/interfaces';
import { IMetrics } from '@/interfaces/IMetrics';
import { ConflictError, NotFoundError } from '@/errors';

// Runs the callback right away with a stand-in client
jest.mock('@/config/database', () => ({
  transaction: jest.fn((callback: (client: object) => Promise<unknown>) => callback({})),
}));

describe('PortfolioService', () => {
  let portfolioService: PortfolioService;
  let mockUserRepo: jest.Mocked<IUserRepository>;
  let mockPortfolioRepo: jest.Mocked<IPortfolioRepository>;
  let mockPositionRepo: jest.Mocked<IPositionRepository>;
  let mockSecurityRepo: jest.Mocked<ISecurityRepository>;
  let mockMetrics: jest.Mocked<IMetrics>;

  beforeEach(() => {
    mockUserRepo = createMockUserRepository();
    mockPortfolioRepo = createMockPortfolioRepository();
    mockPositionRepo = createMockPositionRepository();
    mockSecurityRepo = createMockSecurityRepository();
    mockMetrics = createMockMetrics();

    mockUserRepo.findUserById.mockResolvedValue(owner);
    mockSecurityRepo.findAllSecurities.mockResolvedValue([abcSecurity]);

    portfolioService = new PortfolioService(
      mockUserRepo,
      mockPortfolioRepo,
      mockPositionRepo,
      mockSecurityRepo,
      mockMetrics
    );
  });

  describe('getPortfolioView', () => {
    it('should throw NotFoundError when user does not exist', async () => {
      mockUserRepo.findUserById.mockResolvedValue(null);

      await expect(portfolioService.getPortfolioView(999)).rejects.toThrow(
        'User with ID 999 not found'
      );
    });

    it('should select the first portfolio by default', async () => {
      const position = makePosition();
      mockPortfolioRepo.findPortfoliosByOwner.mockResolvedValue([
        growthPortfolio,
        { id: 11, ownerId: 1, name: 'Income' },
      ]);
      mockPositionRepo.findCurrentEntries.mockResolvedValue([position]);

      const view = await portfolioService.getPortfolioView(1);

      expect(mockPositionRepo.findCurrentEntries).toHaveBeenCalledWith(growthPortfolio.id);
      expect(view).toEqual({
        selectedPortfolio: 'Growth',
        portfolioNames: ['Growth', 'Income'],
        positions: [position],
        securities: [abcSecurity],
      });
    });

    it('should show the requested portfolio', async () => {
      mockPortfolioRepo.findPortfoliosByOwner.mockResolvedValue([
        growthPortfolio,
        { id: 11, ownerId: 1, name: 'Income' },
      ]);
      mockPositionRepo.findCurrentEntries.mockResolvedValue([]);

      const view = await portfolioService.getPortfolioView(1, 'Income');

      expect(mockPositionRepo.findCurrentEntries).toHaveBeenCalledWith(11);
      expect(view.selectedPortfolio).toBe('Income');
    });

    it('should return an empty selection when the owner has no portfolios', async () => {
      mockPortfolioRepo.findPortfoliosByOwner.mockResolvedValue([]);

      const view = await portfolioService.getPortfolioView(1);

      expect(view).toEqual({
        selectedPortfolio: '',
        portfolioNames: [],
        positions: [],
        securities: [abcSecurity],
      });
      expect(mockPositionRepo.findCurrentEntries).not.toHaveBeenCalled();
    });

    it('should reject an unknown selected portfolio', async () => {
      mockPortfolioRepo.findPortfoliosByOwner.mockResolvedValue([growthPortfolio]);

      await expect(portfolioService.getPortfolioView(1, 'Missing')).rejects.toMatchObject({
        statusCode: 404,
        code: 'UNKNOWN_PORTFOLIO',
        message: "The portfolio 'Missing' doesn't exist.",
      });
    });
  });

  describe('addPortfolio', () => {
    it('should create the portfolio', async () => {
      mockPortfolioRepo.findPortfolioByName.mockResolvedValue(null);
      mockPortfolioRepo.createPortfolio.mockResolvedValue(growthPortfolio);

      const result = await portfolioService.addPortfolio(1, 'Growth');

      expect(mockPortfolioRepo.createPortfolio).toHaveBeenCalledWith(1, 'Growth');
      expect(result).toEqual({
        success: true,
        message: "The portfolio 'Growth' has been added.",
        portfolio: growthPortfolio,
      });
      expect(mockMetrics.incrementCounter).toHaveBeenCalledWith('portfolios_created_total');
    });

    it('should reject a duplicate name', async () => {
      mockPortfolioRepo.findPortfolioByName.mockResolvedValue(growthPortfolio);

      const promise = portfolioService.addPortfolio(1, 'Growth');

      await expect(promise).rejects.toThrow(ConflictError);
      await expect(promise).rejects.toMatchObject({
        code: 'DUPLICATE_NAME',
        message: "The portfolio 'Growth' already exists.",
      });
      expect(mockPortfolioRepo.createPortfolio).not.toHaveBeenCalled();
    });

    it('should pass through a conflict raised by a concurrent insert', async () => {
      mockPortfolioRepo.findPortfolioByName.mockResolvedValue(null);
      mockPortfolioRepo.createPortfolio.mockRejectedValue(
        new ConflictError("The portfolio 'Growth' already exists.", 'DUPLICATE_NAME')
      );

      await expect(portfolioService.addPortfolio(1, 'Growth')).rejects.toMatchObject({
        statusCode: 409,
        code: 'DUPLICATE_NAME',
      });
    });
  });

  describe('deletePortfolio', () => {
    it('should delete the ledger and then the portfolio', async () => {
      mockPortfolioRepo.findPortfolioByName.mockResolvedValue(growthPortfolio);
      mockPositionRepo.deleteAllEntries.mockResolvedValue(4);
      mockPortfolioRepo.deletePortfolio.mockResolvedValue(true);

      const result = await portfolioService.deletePortfolio(1, 'Growth');

      expect(mockPortfolioRepo.findPortfolioByName).toHaveBeenCalledWith(
        1,
        'Growth',
        { forUpdate: true },
        {}
      );
      expect(mockPositionRepo.deleteAllEntries).toHaveBeenCalledWith(growthPortfolio.id, {});
      expect(mockPortfolioRepo.deletePortfolio).toHaveBeenCalledWith(growthPortfolio.id, {});
      expect(result).toEqual({
        success: true,
        message: "The portfolio 'Growth' has been deleted.",
        deletedPositions: 4,
      });
      expect(mockMetrics.incrementCounter).toHaveBeenCalledWith('portfolios_deleted_total');
    });

    it('should throw NotFoundError for an unknown portfolio', async () => {
      mockPortfolioRepo.findPortfolioByName.mockResolvedValue(null);

      const promise = portfolioService.deletePortfolio(1, 'Missing');

      await expect(promise).rejects.toThrow(NotFoundError);
      await expect(promise).rejects.toThrow("The portfolio 'Missing' doesn't exist.");
      expect(mockPositionRepo.deleteAllEntries).not.toHaveBeenCalled();
    });
  });
});
