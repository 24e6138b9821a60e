import { Router } from 'express';
import * as securitiesController from '@/controllers/securities.controller';
import { mutationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * GET /api/v1/securities
 */
router.get('/', securitiesController.listSecurities);

/**
 * GET /api/v1/securities/:ticker
 */
router.get('/:ticker', securitiesController.getSecurity);

/**
 * GET /api/v1/securities/:ticker/prices?limit=30
 * Newest close first
 */
router.get('/:ticker/prices', securitiesController.getPriceHistory);

/**
 * POST /api/v1/securities/:ticker/prices
 * Records (or replaces) the close of one day
 */
router.post('/:ticker/prices', mutationRateLimiter, securitiesController.recordClosePrice);

export default router;
