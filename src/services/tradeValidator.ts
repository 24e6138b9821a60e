import Decimal from 'decimal.js';
import { PoolClient } from 'pg';
import {
  Portfolio,
  TradeCandidate,
  TradeIntent,
  TradeRejection,
  TradeValidationResult,
} from '@/models';
import { DISPLAY_CURRENCY, ERROR_CODES, TRADE_SIDES } from '@/constants/trading';
import { AppError, BusinessRuleError, ValidationError } from '@/errors';
import { ISecurityRepository, IPositionRepository } from '@/repositories/interfaces';
import { defaultTradeDate, isWeekend, parseTradeDate } from '@/utils/tradeDate';

/**
 * Source of "now"; injected so date rules can be exercised deterministically
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Trade Validator
 *
 * Admission rules for a proposed trade, checked in order, first failure wins:
 * 1. ticker listed in the catalog
 * 2. trade date is a calendar date, not a weekend, not after the
 *    weekend-adjusted today
 * 3. a position can't be opened with a sell
 * 4. a sell's notional (quantity × price) can't exceed the pair's net value
 * 5. a follow-on trade can't be dated before the current entry
 *
 * Read-only: callers run it inside the transaction that applies the write,
 * passing the same client, so the checked state is the state written over.
 */
export class TradeValidator {
  constructor(
    private securityRepo: ISecurityRepository,
    private positionRepo: IPositionRepository,
    private clock: Clock = systemClock
  ) {}

  async validate(
    portfolio: Portfolio,
    candidate: TradeCandidate,
    intent: TradeIntent,
    client?: PoolClient
  ): Promise<TradeValidationResult> {
    const ticker = candidate.ticker.trim();

    // 1. Ticker existence
    if (!(await this.securityRepo.securityExists(ticker, client))) {
      return reject({ code: 'UNKNOWN_TICKER', ticker });
    }

    // 2. Date sanity; "today" is re-read on every call
    const today = defaultTradeDate(this.clock());
    const tradeDate =
      candidate.tradeDate === undefined ? today : parseTradeDate(candidate.tradeDate);
    if (tradeDate === null) {
      return reject({ code: 'MALFORMED_DATE', value: String(candidate.tradeDate) });
    }
    if (isWeekend(tradeDate)) {
      return reject({ code: 'WEEKEND_TRADE', tradeDate });
    }
    if (tradeDate > today) {
      return reject({ code: 'FUTURE_TRADE', tradeDate, today });
    }

    // 3. First trade must open with a buy
    if (intent.kind === 'FIRST_TRADE' && candidate.side === TRADE_SIDES.SELL) {
      return reject({ code: 'SELL_WITHOUT_HOLDINGS', ticker });
    }

    // 4. Oversell
    const price = new Decimal(candidate.price);
    if (candidate.side === TRADE_SIDES.SELL) {
      const netValue = await this.positionRepo.getNetValue(portfolio.id, ticker, client);
      if (netValue === null) {
        return reject({ code: 'SELL_WITHOUT_HOLDINGS', ticker });
      }

      const requested = price.times(candidate.quantity);
      const available = new Decimal(netValue);
      if (requested.greaterThan(available)) {
        return reject({
          code: 'INSUFFICIENT_HOLDINGS',
          ticker,
          requested: requested.toString(),
          available: available.toString(),
        });
      }
    }

    // 5. Monotonic trade dates
    if (intent.kind === 'FOLLOW_ON_TRADE' && tradeDate < intent.lastEntry.tradeDate) {
      return reject({ code: 'BACKDATED_TRADE', ticker, lastDate: intent.lastEntry.tradeDate });
    }

    return {
      ok: true,
      trade: {
        ticker,
        side: candidate.side,
        quantity: candidate.quantity,
        price: price.toString(),
        tradeDate,
        comments: candidate.comments?.trim() ?? '',
      },
    };
  }
}

function reject(rejection: TradeRejection): TradeValidationResult {
  return { ok: false, rejection };
}

/**
 * User-facing message for a rejected trade
 */
export function describeRejection(rejection: TradeRejection): string {
  switch (rejection.code) {
    case 'UNKNOWN_TICKER':
      return `The ticker '${rejection.ticker}' doesn't exist in the database.`;
    case 'MALFORMED_DATE':
      return 'The trade date format is invalid.';
    case 'WEEKEND_TRADE':
      return "The trade date can't fall on weekends.";
    case 'FUTURE_TRADE':
      return "The trade date can't be a date in the future.";
    case 'SELL_WITHOUT_HOLDINGS':
      return "You can't sell if your portfolio is empty.";
    case 'INSUFFICIENT_HOLDINGS':
      return (
        `You tried to sell ${DISPLAY_CURRENCY} ${new Decimal(rejection.requested).toFixed(2)} ` +
        `worth of '${rejection.ticker}', but you only have ` +
        `${DISPLAY_CURRENCY} ${new Decimal(rejection.available).toFixed(2)} in total.`
      );
    case 'BACKDATED_TRADE':
      return (
        `The last trade date for ticker '${rejection.ticker}' is ` +
        `'${rejection.lastDate}', the new date can't be before that.`
      );
  }
}

/**
 * Error thrown to the HTTP layer for a rejected trade
 * A malformed date is bad input (400); everything else breaks a ledger rule (422)
 */
export function rejectionToError(rejection: TradeRejection): AppError {
  const { code, ...details } = rejection;
  const message = describeRejection(rejection);

  if (code === 'MALFORMED_DATE') {
    return new ValidationError(message, details, ERROR_CODES.MALFORMED_DATE);
  }
  return new BusinessRuleError(message, ERROR_CODES[code], details);
}
