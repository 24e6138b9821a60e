import { Request, Response, NextFunction } from 'express';
import { positionService } from '@/config/dependencies';
import { addPositionSchema, updatePositionSchema } from '@/validators/position.validator';
import { userIdParamSchema } from '@/validators/portfolio.validator';
import { parseInput } from '@/utils/validation';

/**
 * Positions Controller
 * Trades on /users/:userId/portfolios/:portfolioName/positions
 */

/**
 * POST .../positions
 * Opens a position, or trades on top of the current entry of the ticker
 */
export async function addPosition(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = parseInput(userIdParamSchema, req.params.userId, 'Invalid user ID');
    const trade = parseInput(addPositionSchema, req.body, 'Invalid position data');

    const response = await positionService.addPosition(
      userId,
      req.params.portfolioName ?? '',
      trade
    );

    res.status(201).json(response);
  } catch (error) {
    next(error);
  }
}

/**
 * PUT .../positions/:ticker
 */
export async function updatePosition(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = parseInput(userIdParamSchema, req.params.userId, 'Invalid user ID');
    const trade = parseInput(updatePositionSchema, req.body, 'Invalid position data');

    const response = await positionService.updatePosition(
      userId,
      req.params.portfolioName ?? '',
      req.params.ticker ?? '',
      trade
    );

    res.json(response);
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE .../positions/:ticker
 */
export async function deletePosition(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = parseInput(userIdParamSchema, req.params.userId, 'Invalid user ID');

    const response = await positionService.deletePosition(
      userId,
      req.params.portfolioName ?? '',
      req.params.ticker ?? ''
    );

    res.json(response);
  } catch (error) {
    next(error);
  }
}

/**
 * GET .../positions/:ticker/history
 */
export async function getPositionHistory(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = parseInput(userIdParamSchema, req.params.userId, 'Invalid user ID');

    const history = await positionService.getPositionHistory(
      userId,
      req.params.portfolioName ?? '',
      req.params.ticker ?? ''
    );

    res.json(history);
  } catch (error) {
    next(error);
  }
}
