import { Portfolio, Position, Security, User } from '@/models';

export const owner: User = { id: 1, email: 'owner@example.com' };

export const growthPortfolio: Portfolio = { id: 10, ownerId: 1, name: 'Growth' };

export const abcSecurity: Security = {
  ticker: 'ABC',
  name: 'Example Corp',
  exchange: 'NYSE',
  currency: 'USD',
  country: 'US',
  isin: 'US0000000001',
};

export function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    id: 1,
    portfolioId: growthPortfolio.id,
    ticker: 'ABC',
    quantity: 10,
    price: '100.000000',
    side: 'buy',
    tradeDate: '2024-01-08',
    isCurrent: true,
    createdAt: new Date(0),
    comments: '',
    ...overrides,
  };
}
