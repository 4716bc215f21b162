import { BidParseError, BidValidationError } from '../../common/errors';
import type { Auction, BidLimits } from './types';

const SUFFIXES: Record<string, bigint> = {
  k: 1_000n,
  m: 1_000_000n,
  b: 1_000_000_000n,
  t: 1_000_000_000_000n,
};

const PLAIN_PATTERN = /^\d+$/;
const SUFFIX_PATTERN = /^(\d*)(?:\.(\d+))?([a-z])$/;

/**
 * Parse a bid amount such as `250k`, `2.5m`, `1,000,000` or `1t`.
 * Fractions of a unit are truncated. Arithmetic is exact.
 */
export function parseAmount(text: string): number {
  const cleaned = text.trim().toLowerCase().replace(/[\s,_]/g, '');
  if (cleaned === '') throw new BidParseError('Empty amount');

  let value: bigint;
  if (PLAIN_PATTERN.test(cleaned)) {
    value = BigInt(cleaned);
  } else {
    const match = SUFFIX_PATTERN.exec(cleaned);
    if (!match) {
      throw new BidParseError(
        `Invalid format: ${text}. Examples: 250k, 2.5m, 1000000, 5b`,
      );
    }
    const [, whole = '', fraction = '', suffix = ''] = match;
    const multiplier = SUFFIXES[suffix];
    if (multiplier === undefined) {
      throw new BidParseError(`Unsupported suffix "${suffix}" in ${text}`);
    }
    if (whole === '' && fraction === '') {
      throw new BidParseError(`Invalid format: ${text}`);
    }
    const scale = 10n ** BigInt(fraction.length);
    value =
      BigInt(whole || '0') * multiplier +
      (BigInt(fraction || '0') * multiplier) / scale;
  }

  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new BidParseError(`Amount too large: ${text}`);
  }
  return Number(value);
}

/** Smallest amount the next bid may carry. */
export function minimumNextBid(
  auction: Pick<Auction, 'currentBid' | 'startBid' | 'minIncrement'>,
): number {
  return auction.currentBid === null
    ? auction.startBid
    : auction.currentBid + auction.minIncrement;
}

export function validateAmount(
  amount: number,
  auction: Pick<Auction, 'currentBid' | 'startBid' | 'minIncrement'>,
  limits: BidLimits,
): BidValidationError | null {
  if (!Number.isSafeInteger(amount)) {
    return new BidValidationError('Amount must be a whole number');
  }
  if (amount < limits.minBidAmount) {
    return new BidValidationError(
      `Amount must be at least ${fmtAmount(limits.minBidAmount)}`,
    );
  }
  if (amount > limits.maxBidAmount) {
    return new BidValidationError(
      `Amount cannot exceed ${fmtAmount(limits.maxBidAmount)}`,
    );
  }
  if (auction.currentBid === null) {
    if (amount < auction.startBid) {
      return new BidValidationError(
        `First bid must be at least the starting bid (${fmtAmount(auction.startBid)})`,
      );
    }
    return null;
  }
  if (amount < auction.currentBid + auction.minIncrement) {
    return new BidValidationError(
      `Bid must exceed the leading bid by at least ${fmtAmount(auction.minIncrement)} (minimum ${fmtAmount(auction.currentBid + auction.minIncrement)})`,
    );
  }
  return null;
}

/**
 * Commission on `amount` at `pct` percent, rounded half-up to a whole unit.
 * Percentages are taken to two decimals. Never throws.
 */
export function calculateCommission(amount: number, pct: number): number {
  if (!Number.isFinite(amount) || !Number.isFinite(pct)) return 0;
  if (amount <= 0 || pct <= 0) return 0;
  const basisPoints = BigInt(Math.round(pct * 100));
  const units = BigInt(Math.trunc(amount));
  return Number((units * basisPoints + 5_000n) / 10_000n);
}

const SCALES: Array<[number, string]> = [
  [1_000_000_000_000, 'T'],
  [1_000_000_000, 'B'],
  [1_000_000, 'M'],
  [1_000, 'K'],
];

/** Short display form: 250000 → 250K, 2500000 → 2.5M. */
export function fmtAmount(amount: number | null | undefined, fallback = '0'): string {
  if (amount === null || amount === undefined || !Number.isFinite(amount)) {
    return fallback;
  }
  const whole = Math.trunc(amount);
  if (whole === 0) return fallback;
  const sign = whole < 0 ? '-' : '';
  const abs = Math.abs(whole);
  for (const [scale, suffix] of SCALES) {
    if (abs >= scale) {
      const fixed = (abs / scale).toFixed(2).replace(/0+$/, '').replace(/\.$/, '');
      return `${sign}${fixed}${suffix}`;
    }
  }
  return `${sign}${abs}`;
}

/** Display delta between two amounts: `+50K`, `-50K`, `±0`. */
export function compareAmounts(a: number, b: number): string {
  const diff = a - b;
  if (diff === 0) return '±0';
  return (diff > 0 ? '+' : '') + fmtAmount(diff);
}
