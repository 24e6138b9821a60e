import { Request, Response, NextFunction } from 'express';
import { securityService } from '@/config/dependencies';
import { priceHistoryQuerySchema, recordPriceSchema } from '@/validators/price.validator';
import { parseInput } from '@/utils/validation';

/**
 * Securities Controller
 * Handles HTTP requests for the security catalog and close prices
 */

/**
 * GET /api/v1/securities
 */
export async function listSecurities(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await securityService.listSecurities();
    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/securities/:ticker
 */
export async function getSecurity(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const security = await securityService.getSecurity(req.params.ticker ?? '');
    res.json(security);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/securities/:ticker/prices?limit=30
 */
export async function getPriceHistory(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const { limit } = parseInput(priceHistoryQuerySchema, req.query, 'Invalid query');

    const result = await securityService.getPriceHistory(req.params.ticker ?? '', limit);

    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/securities/:ticker/prices
 */
export async function recordClosePrice(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const { date, close } = parseInput(recordPriceSchema, req.body, 'Invalid price data');

    const response = await securityService.recordClosePrice(req.params.ticker ?? '', date, close);

    res.status(201).json(response);
  } catch (error) {
    next(error);
  }
}
