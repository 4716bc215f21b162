import { BidParseError } from '../../common/errors';
import {
  calculateCommission,
  compareAmounts,
  fmtAmount,
  minimumNextBid,
  parseAmount,
  validateAmount,
} from './bid-amount';

const limits = { minBidAmount: 1_000, maxBidAmount: 1_000_000_000_000 };

describe('parseAmount', () => {
  it.each([
    ['250k', 250_000],
    ['2.5m', 2_500_000],
    ['1,000,000', 1_000_000],
    ['1T', 1_000_000_000_000],
    ['1.5b', 1_500_000_000],
    [' 300 K ', 300_000],
    ['.5k', 500],
    ['1_000', 1_000],
    ['42', 42],
  ])('parses %p as %p', (text, expected) => {
    expect(parseAmount(text)).toBe(expected);
  });

  it('truncates fractions of a unit', () => {
    expect(parseAmount('1.2345k')).toBe(1_234);
  });

  it.each(['', 'abc', '-5k', '1.2.3k', 'k', '5kk'])('rejects %p', (text) => {
    expect(() => parseAmount(text)).toThrow(BidParseError);
  });

  it('names an unsupported suffix', () => {
    expect(() => parseAmount('5x')).toThrow('Unsupported suffix "x" in 5x');
  });

  it('rejects results beyond the safe integer range', () => {
    expect(() => parseAmount('99999999t')).toThrow('Amount too large: 99999999t');
  });
});

describe('validateAmount', () => {
  const fresh = { currentBid: null, startBid: 250_000, minIncrement: 50_000 };
  const running = { currentBid: 300_000, startBid: 250_000, minIncrement: 50_000 };

  it('accepts a first bid at the starting bid', () => {
    expect(validateAmount(250_000, fresh, limits)).toBeNull();
  });

  it('rejects a first bid below the starting bid', () => {
    expect(validateAmount(200_000, fresh, limits)?.message).toBe(
      'First bid must be at least the starting bid (250K)',
    );
  });

  it('enforces the global bounds', () => {
    expect(validateAmount(500, fresh, limits)?.message).toBe('Amount must be at least 1K');
    expect(validateAmount(2_000_000_000_000, fresh, limits)?.message).toBe(
      'Amount cannot exceed 1T',
    );
    expect(validateAmount(1.5, fresh, limits)?.message).toBe('Amount must be a whole number');
  });

  it('requires the minimum increment over the leading bid', () => {
    expect(validateAmount(320_000, running, limits)?.message).toBe(
      'Bid must exceed the leading bid by at least 50K (minimum 350K)',
    );
    expect(validateAmount(350_000, running, limits)).toBeNull();
  });

  it('reports the minimum next bid', () => {
    expect(minimumNextBid(fresh)).toBe(250_000);
    expect(minimumNextBid(running)).toBe(350_000);
  });
});

describe('calculateCommission', () => {
  it('rounds half up to a whole unit', () => {
    expect(calculateCommission(1_000_000, 20)).toBe(200_000);
    expect(calculateCommission(333, 20)).toBe(67);
    expect(calculateCommission(5, 10)).toBe(1);
    expect(calculateCommission(1_000_000, 12.5)).toBe(125_000);
  });

  it('returns 0 for unusable input', () => {
    expect(calculateCommission(0, 20)).toBe(0);
    expect(calculateCommission(100, -5)).toBe(0);
    expect(calculateCommission(Number.NaN, 20)).toBe(0);
    expect(calculateCommission(100, Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('display helpers', () => {
  it('formats amounts with short suffixes', () => {
    expect(fmtAmount(250_000)).toBe('250K');
    expect(fmtAmount(2_500_000)).toBe('2.5M');
    expect(fmtAmount(1_000_000)).toBe('1M');
    expect(fmtAmount(1_500_000_000)).toBe('1.5B');
    expect(fmtAmount(1_000_000_000_000)).toBe('1T');
    expect(fmtAmount(1_234)).toBe('1.23K');
    expect(fmtAmount(999)).toBe('999');
  });

  it('uses the fallback for empty values', () => {
    expect(fmtAmount(0)).toBe('0');
    expect(fmtAmount(null, 'No bids yet')).toBe('No bids yet');
  });

  it('compares amounts', () => {
    expect(compareAmounts(300_000, 250_000)).toBe('+50K');
    expect(compareAmounts(250_000, 300_000)).toBe('-50K');
    expect(compareAmounts(250_000, 250_000)).toBe('±0');
  });
});
