import { TradeSide } from '@/constants/trading';

/**
 * Position model (ledger entry)
 * One recorded trade, matches the 'positions' table
 *
 * For each (portfolioId, ticker) at most one entry has isCurrent = true,
 * and it is the latest trade for that pair. Older entries stay in the
 * ledger as history and still count towards the net value.
 */
export interface Position {
  id: number;
  portfolioId: number;
  ticker: string;
  quantity: number; // INTEGER
  price: string; // NUMERIC(12,6), string for precision
  side: TradeSide;
  tradeDate: string; // YYYY-MM-DD
  isCurrent: boolean;
  createdAt: Date;
  comments: string;
}

/**
 * Data needed to append a ledger entry
 */
export type NewPosition = Omit<Position, 'id' | 'isCurrent' | 'createdAt'>;

/**
 * Full trade history of one ticker inside a portfolio
 */
export interface PositionHistory {
  portfolio: string;
  ticker: string;
  netValue: string;
  entries: Position[];
}
