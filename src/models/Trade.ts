import { TradeSide } from '@/constants/trading';
import { Position } from './Position';

/**
 * A proposed trade, as submitted by the user
 */
export interface TradeCandidate {
  ticker: string;
  side: TradeSide;
  quantity: number;
  price: string; // decimal string
  tradeDate?: string; // expected YYYY-MM-DD; omitted means the latest tradable day
  comments?: string;
}

/**
 * Where the trade sits in the (portfolio, ticker) history
 *
 * FIRST_TRADE: nothing recorded yet, the trade opens the position
 * FOLLOW_ON_TRADE: lastEntry is the current entry it will supersede
 */
export type TradeIntent =
  | { kind: 'FIRST_TRADE' }
  | { kind: 'FOLLOW_ON_TRADE'; lastEntry: Position };

/**
 * A trade that passed every ledger rule, normalized for insertion
 */
export interface ValidatedTrade {
  ticker: string;
  side: TradeSide;
  quantity: number;
  price: string;
  tradeDate: string;
  comments: string;
}

/**
 * Why a trade was refused
 * Amounts are decimal strings
 */
export type TradeRejection =
  | { code: 'UNKNOWN_TICKER'; ticker: string }
  | { code: 'MALFORMED_DATE'; value: string }
  | { code: 'WEEKEND_TRADE'; tradeDate: string }
  | { code: 'FUTURE_TRADE'; tradeDate: string; today: string }
  | { code: 'SELL_WITHOUT_HOLDINGS'; ticker: string }
  | { code: 'INSUFFICIENT_HOLDINGS'; ticker: string; requested: string; available: string }
  | { code: 'BACKDATED_TRADE'; ticker: string; lastDate: string };

export type TradeValidationResult =
  | { ok: true; trade: ValidatedTrade }
  | { ok: false; rejection: TradeRejection };
