import { Router } from 'express';
import * as portfoliosController from '@/controllers/portfolios.controller';
import * as positionsController from '@/controllers/positions.controller';
import { mutationRateLimiter } from '@/middlewares/rateLimiter';

// Mounted at /users/:userId/portfolios
const router = Router({ mergeParams: true });

/**
 * GET /api/v1/users/:userId/portfolios?selected=
 * Portfolio page: names, current positions of the selected one, catalog
 */
router.get('/', portfoliosController.getPortfolioView);

/**
 * POST /api/v1/users/:userId/portfolios
 */
router.post('/', mutationRateLimiter, portfoliosController.createPortfolio);

/**
 * DELETE /api/v1/users/:userId/portfolios/:portfolioName
 */
router.delete('/:portfolioName', mutationRateLimiter, portfoliosController.deletePortfolio);

/**
 * POST /api/v1/users/:userId/portfolios/:portfolioName/positions
 * Applies stricter rate limiting (30 trades/minute)
 */
router.post('/:portfolioName/positions', mutationRateLimiter, positionsController.addPosition);

/**
 * PUT /api/v1/users/:userId/portfolios/:portfolioName/positions/:ticker
 */
router.put(
  '/:portfolioName/positions/:ticker',
  mutationRateLimiter,
  positionsController.updatePosition
);

/**
 * DELETE /api/v1/users/:userId/portfolios/:portfolioName/positions/:ticker
 */
router.delete(
  '/:portfolioName/positions/:ticker',
  mutationRateLimiter,
  positionsController.deletePosition
);

/**
 * GET /api/v1/users/:userId/portfolios/:portfolioName/positions/:ticker/history
 */
router.get('/:portfolioName/positions/:ticker/history', positionsController.getPositionHistory);

export default router;
