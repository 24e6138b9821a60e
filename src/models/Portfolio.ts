import { Position } from './Position';
import { Security } from './Security';

/**
 * Portfolio model
 * Named container owned by a user, matches the 'portfolios' table
 */
export interface Portfolio {
  id: number;
  ownerId: number;
  name: string;
}

/**
 * Everything needed to render the portfolio page
 */
export interface PortfolioView {
  selectedPortfolio: string; // '' when the owner has no portfolios
  portfolioNames: string[];
  positions: Position[]; // current entries of the selected portfolio
  securities: Security[];
}
