import { addPositionSchema, updatePositionSchema } from '@/validators/position.validator';
import { createPortfolioSchema, userIdParamSchema } from '@/validators/portfolio.validator';
import { priceHistoryQuerySchema, recordPriceSchema } from '@/validators/price.validator';

describe('position validators', () => {
  const validTrade = {
    ticker: ' ABC ',
    side: 'buy',
    quantity: 10,
    price: 100.5,
    tradeDate: '2024-01-08',
  };

  it('should normalize a valid trade', () => {
    const result = addPositionSchema.safeParse(validTrade);

    expect(result.success && result.data).toEqual({
      ticker: 'ABC',
      side: 'buy',
      quantity: 10,
      price: '100.5',
      tradeDate: '2024-01-08',
    });
  });

  it('should accept form-encoded numbers', () => {
    const result = addPositionSchema.safeParse({ ...validTrade, quantity: '10', price: '99.125' });

    expect(result.success && result.data.quantity).toBe(10);
    expect(result.success && result.data.price).toBe('99.125');
  });

  it('should leave tradeDate and comments optional', () => {
    const result = updatePositionSchema.safeParse({ side: 'sell', quantity: 1, price: '1' });

    expect(result.success && result.data).toEqual({ side: 'sell', quantity: 1, price: '1' });
  });

  it.each([
    ['a fractional quantity', { quantity: 1.5 }],
    ['a zero quantity', { quantity: 0 }],
    ['a quantity over the limit', { quantity: 100_001 }],
    ['a boolean quantity', { quantity: true }],
    ['a null quantity', { quantity: null }],
    ['a non-numeric quantity', { quantity: 'ten' }],
    ['a price below 1', { price: '0.99' }],
    ['a price over the limit', { price: '1000000.01' }],
    ['a price with seven decimals', { price: '1.1234567' }],
    ['a non-numeric price', { price: 'abc' }],
    ['an unknown side', { side: 'short' }],
    ['an empty ticker', { ticker: '   ' }],
    ['a ticker over 20 characters', { ticker: 'A'.repeat(21) }],
    ['comments over 140 characters', { comments: 'x'.repeat(141) }],
  ])('should reject %s', (_label, override) => {
    expect(addPositionSchema.safeParse({ ...validTrade, ...override }).success).toBe(false);
  });
});

describe('portfolio validators', () => {
  it('should trim the name before checking its length', () => {
    const result = createPortfolioSchema.safeParse({ name: '  Growth  ' });

    expect(result.success && result.data.name).toBe('Growth');
    expect(createPortfolioSchema.safeParse({ name: ' ab ' }).success).toBe(false);
    expect(createPortfolioSchema.safeParse({ name: 'x'.repeat(26) }).success).toBe(false);
  });

  it('should parse positive integer user ids', () => {
    expect(userIdParamSchema.safeParse('7').success).toBe(true);
    expect(userIdParamSchema.safeParse('0').success).toBe(false);
    expect(userIdParamSchema.safeParse('abc').success).toBe(false);
  });
});

describe('price validators', () => {
  it('should default the history limit', () => {
    const result = priceHistoryQuerySchema.safeParse({});

    expect(result.success && result.data.limit).toBe(30);
  });

  it('should cap the history limit', () => {
    expect(priceHistoryQuerySchema.safeParse({ limit: '501' }).success).toBe(false);
  });

  it('should normalize a recorded close', () => {
    const result = recordPriceSchema.safeParse({ date: '2024-01-09', close: 101.25 });

    expect(result.success && result.data).toEqual({ date: '2024-01-09', close: '101.25' });
  });
});
