import {
  TradeValidator,
  describeRejection,
  rejectionToError,
} from '@/services/tradeValidator';
import {
  createMockSecurityRepository,
  createMockPositionRepository,
} from '@/tests/utils/mockRepositories';
import { growthPortfolio, makePosition } from '@/tests/utils/fixtures';
import { ISecurityRepository, IPositionRepository } from '@/repositories/interfaces';
import { TradeCandidate, TradeIntent } from '@/models';
import { BusinessRuleError, ValidationError } from '@/errors';

// Wednesday
const WEDNESDAY = new Date(2024, 0, 10, 12);
const SATURDAY = new Date(2024, 0, 13, 12);

const FIRST: TradeIntent = { kind: 'FIRST_TRADE' };

function followOn(tradeDate = '2024-01-08'): TradeIntent {
  return { kind: 'FOLLOW_ON_TRADE', lastEntry: makePosition({ id: 7, tradeDate }) };
}

function candidate(overrides: Partial<TradeCandidate> = {}): TradeCandidate {
  return {
    ticker: 'ABC',
    side: 'buy',
    quantity: 10,
    price: '100',
    tradeDate: '2024-01-08',
    ...overrides,
  };
}

describe('TradeValidator', () => {
  let mockSecurityRepo: jest.Mocked<ISecurityRepository>;
  let mockPositionRepo: jest.Mocked<IPositionRepository>;
  let validator: TradeValidator;

  beforeEach(() => {
    mockSecurityRepo = createMockSecurityRepository();
    mockPositionRepo = createMockPositionRepository();
    mockSecurityRepo.securityExists.mockResolvedValue(true);
    validator = new TradeValidator(mockSecurityRepo, mockPositionRepo, () => WEDNESDAY);
  });

  describe('ticker', () => {
    it('should reject a ticker missing from the catalog', async () => {
      mockSecurityRepo.securityExists.mockResolvedValue(false);

      const result = await validator.validate(growthPortfolio, candidate({ ticker: 'NOPE' }), FIRST);

      expect(result).toEqual({ ok: false, rejection: { code: 'UNKNOWN_TICKER', ticker: 'NOPE' } });
    });

    it('should look the ticker up trimmed', async () => {
      const result = await validator.validate(growthPortfolio, candidate({ ticker: '  ABC ' }), FIRST);

      expect(mockSecurityRepo.securityExists).toHaveBeenCalledWith('ABC', undefined);
      expect(result.ok).toBe(true);
    });

    it('should check the ticker before anything else', async () => {
      mockSecurityRepo.securityExists.mockResolvedValue(false);

      const result = await validator.validate(
        growthPortfolio,
        candidate({ ticker: 'NOPE', side: 'sell', tradeDate: '2024-01-06' }),
        FIRST
      );

      expect(result).toEqual({ ok: false, rejection: { code: 'UNKNOWN_TICKER', ticker: 'NOPE' } });
    });
  });

  describe('trade date', () => {
    it('should reject a malformed date', async () => {
      const result = await validator.validate(growthPortfolio, candidate({ tradeDate: '2024-13-01' }), FIRST);

      expect(result).toEqual({ ok: false, rejection: { code: 'MALFORMED_DATE', value: '2024-13-01' } });
    });

    it('should reject a weekend date', async () => {
      const result = await validator.validate(growthPortfolio, candidate({ tradeDate: '2024-01-06' }), FIRST);

      expect(result).toEqual({ ok: false, rejection: { code: 'WEEKEND_TRADE', tradeDate: '2024-01-06' } });
    });

    it('should reject a date after today', async () => {
      const result = await validator.validate(growthPortfolio, candidate({ tradeDate: '2024-01-11' }), FIRST);

      expect(result).toEqual({
        ok: false,
        rejection: { code: 'FUTURE_TRADE', tradeDate: '2024-01-11', today: '2024-01-10' },
      });
    });

    it('should accept today', async () => {
      const result = await validator.validate(growthPortfolio, candidate({ tradeDate: '2024-01-10' }), FIRST);

      expect(result.ok).toBe(true);
    });

    it('should default an omitted date to today', async () => {
      const result = await validator.validate(growthPortfolio, candidate({ tradeDate: undefined }), FIRST);

      expect(result).toMatchObject({ ok: true, trade: { tradeDate: '2024-01-10' } });
    });

    it('should default to Friday when today is a Saturday', async () => {
      validator = new TradeValidator(mockSecurityRepo, mockPositionRepo, () => SATURDAY);

      const result = await validator.validate(growthPortfolio, candidate({ tradeDate: undefined }), FIRST);

      expect(result).toMatchObject({ ok: true, trade: { tradeDate: '2024-01-12' } });
    });

    it('should treat Friday as the latest tradable day over a weekend', async () => {
      validator = new TradeValidator(mockSecurityRepo, mockPositionRepo, () => SATURDAY);

      const result = await validator.validate(growthPortfolio, candidate({ tradeDate: '2024-01-15' }), FIRST);

      expect(result).toEqual({
        ok: false,
        rejection: { code: 'FUTURE_TRADE', tradeDate: '2024-01-15', today: '2024-01-12' },
      });
    });
  });

  describe('sells', () => {
    it('should refuse to open a position with a sell', async () => {
      const result = await validator.validate(growthPortfolio, candidate({ side: 'sell' }), FIRST);

      expect(result).toEqual({ ok: false, rejection: { code: 'SELL_WITHOUT_HOLDINGS', ticker: 'ABC' } });
      expect(mockPositionRepo.getNetValue).not.toHaveBeenCalled();
    });

    it('should refuse a sell when the pair has no entries', async () => {
      mockPositionRepo.getNetValue.mockResolvedValue(null);

      const result = await validator.validate(growthPortfolio, candidate({ side: 'sell' }), followOn());

      expect(result).toEqual({ ok: false, rejection: { code: 'SELL_WITHOUT_HOLDINGS', ticker: 'ABC' } });
    });

    it('should refuse a sell worth more than the net value', async () => {
      mockPositionRepo.getNetValue.mockResolvedValue('500');

      const result = await validator.validate(
        growthPortfolio,
        candidate({ side: 'sell', tradeDate: '2024-01-09' }),
        followOn()
      );

      expect(mockPositionRepo.getNetValue).toHaveBeenCalledWith(growthPortfolio.id, 'ABC', undefined);
      expect(result).toEqual({
        ok: false,
        rejection: {
          code: 'INSUFFICIENT_HOLDINGS',
          ticker: 'ABC',
          requested: '1000',
          available: '500',
        },
      });
    });

    it('should allow selling exactly the net value', async () => {
      mockPositionRepo.getNetValue.mockResolvedValue('500.000000');

      const result = await validator.validate(
        growthPortfolio,
        candidate({ side: 'sell', quantity: 5, tradeDate: '2024-01-09' }),
        followOn()
      );

      expect(result.ok).toBe(true);
    });

    it('should compare decimals exactly', async () => {
      mockPositionRepo.getNetValue.mockResolvedValue('0.3');

      const result = await validator.validate(
        growthPortfolio,
        candidate({ side: 'sell', quantity: 3, price: '0.1' }),
        followOn()
      );

      expect(result.ok).toBe(true);
    });
  });

  describe('back-dating', () => {
    it('should refuse a follow-on trade dated before the current entry', async () => {
      const result = await validator.validate(
        growthPortfolio,
        candidate({ tradeDate: '2024-01-08' }),
        followOn('2024-01-09')
      );

      expect(result).toEqual({
        ok: false,
        rejection: { code: 'BACKDATED_TRADE', ticker: 'ABC', lastDate: '2024-01-09' },
      });
    });

    it('should allow a follow-on trade on the same day', async () => {
      const result = await validator.validate(
        growthPortfolio,
        candidate({ tradeDate: '2024-01-09' }),
        followOn('2024-01-09')
      );

      expect(result.ok).toBe(true);
    });
  });

  it('should normalize an admitted trade', async () => {
    const result = await validator.validate(
      growthPortfolio,
      candidate({ ticker: ' ABC ', price: '100.50', comments: '  first lot ' }),
      FIRST
    );

    expect(result).toEqual({
      ok: true,
      trade: {
        ticker: 'ABC',
        side: 'buy',
        quantity: 10,
        price: '100.5',
        tradeDate: '2024-01-08',
        comments: 'first lot',
      },
    });
  });
});

describe('describeRejection', () => {
  it('should print oversell amounts with two decimals', () => {
    expect(
      describeRejection({
        code: 'INSUFFICIENT_HOLDINGS',
        ticker: 'ABC',
        requested: '1000',
        available: '500',
      })
    ).toBe("You tried to sell USD 1000.00 worth of 'ABC', but you only have USD 500.00 in total.");
  });

  it('should name the last trade date of a back-dated trade', () => {
    expect(describeRejection({ code: 'BACKDATED_TRADE', ticker: 'ABC', lastDate: '2024-01-09' })).toBe(
      "The last trade date for ticker 'ABC' is '2024-01-09', the new date can't be before that."
    );
  });
});

describe('rejectionToError', () => {
  it('should turn a malformed date into a 400', () => {
    const error = rejectionToError({ code: 'MALFORMED_DATE', value: 'yesterday' });

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('MALFORMED_DATE');
    expect(error.details).toEqual({ value: 'yesterday' });
  });

  it('should turn ledger rule failures into a 422', () => {
    const error = rejectionToError({ code: 'WEEKEND_TRADE', tradeDate: '2024-01-06' });

    expect(error).toBeInstanceOf(BusinessRuleError);
    expect(error.statusCode).toBe(422);
    expect(error.code).toBe('WEEKEND_TRADE');
    expect(error.message).toBe("The trade date can't fall on weekends.");
    expect(error.details).toEqual({ tradeDate: '2024-01-06' });
  });
});
