import { Request, Response, NextFunction } from 'express';
import { portfolioService } from '@/config/dependencies';
import {
  createPortfolioSchema,
  portfolioViewQuerySchema,
  userIdParamSchema,
} from '@/validators/portfolio.validator';
import { parseInput } from '@/utils/validation';

/**
 * Portfolios Controller
 * Handles HTTP requests for /users/:userId/portfolios
 */

/**
 * GET /api/v1/users/:userId/portfolios?selected=
 * Portfolio names, current positions of the selected one and the catalog
 */
export async function getPortfolioView(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = parseInput(userIdParamSchema, req.params.userId, 'Invalid user ID');
    const { selected } = parseInput(portfolioViewQuerySchema, req.query, 'Invalid query');

    const view = await portfolioService.getPortfolioView(userId, selected);

    res.json(view);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/users/:userId/portfolios
 */
export async function createPortfolio(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = parseInput(userIdParamSchema, req.params.userId, 'Invalid user ID');
    const { name } = parseInput(createPortfolioSchema, req.body, 'Invalid portfolio data');

    const response = await portfolioService.addPortfolio(userId, name);

    res.status(201).json(response);
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /api/v1/users/:userId/portfolios/:portfolioName
 * Removes the portfolio and its whole ledger
 */
export async function deletePortfolio(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = parseInput(userIdParamSchema, req.params.userId, 'Invalid user ID');

    const response = await portfolioService.deletePortfolio(userId, req.params.portfolioName ?? '');

    res.json(response);
  } catch (error) {
    next(error);
  }
}
