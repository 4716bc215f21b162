export type AuctionErrorCode =
  | 'VALIDATION'
  | 'BID_PARSE'
  | 'BID_VALIDATION'
  | 'CONCURRENCY_CONFLICT'
  | 'STATE'
  | 'THROTTLED'
  | 'CONFLICT'
  | 'PERMISSION'
  | 'TRANSPORT'
  | 'TRANSPORT_PERMISSION'
  | 'STORAGE';

/**
 * Base class of every error the auction core reports. `code` is stable and is
 * what the command surface hands back to callers.
 */
export abstract class AuctionError extends Error {
  abstract readonly code: AuctionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range input. */
export class ValidationError extends AuctionError {
  readonly code: AuctionErrorCode = 'VALIDATION';
}

export class BidParseError extends ValidationError {
  override readonly code: AuctionErrorCode = 'BID_PARSE';
}

export class BidValidationError extends ValidationError {
  override readonly code: AuctionErrorCode = 'BID_VALIDATION';
}

/** Caller lacks the role, admin right, secret or channel the command needs. */
export class PermissionError extends AuctionError {
  readonly code: AuctionErrorCode = 'PERMISSION';
}

/**
 * The bid was valid against the amount the bidder saw, but another bid was
 * accepted first. Carries the new leading bid so the caller can retry.
 */
export class ConcurrencyConflict extends AuctionError {
  readonly code: AuctionErrorCode = 'CONCURRENCY_CONFLICT';

  constructor(
    readonly leadingBid: number,
    readonly leadingBidderId: string | null,
    readonly minimumNextBid: number,
  ) {
    super(
      `Outbid while your bid was processed: leading bid is now ${leadingBid}`,
    );
  }
}

/** Operation not valid in the auction's current phase. */
export class StateError extends AuctionError {
  readonly code: AuctionErrorCode = 'STATE';
}

/** Bid refused by the per-user cooldown or per-minute cap. */
export class ThrottledError extends AuctionError {
  readonly code: AuctionErrorCode = 'THROTTLED';

  constructor(
    readonly reason: 'cooldown' | 'rate_limit',
    readonly retryAfterMs: number,
  ) {
    super(
      reason === 'cooldown'
        ? `Wait ${Math.ceil(retryAfterMs / 1000)}s before bidding again`
        : `Too many bids; try again in ${Math.ceil(retryAfterMs / 1000)}s`,
    );
  }
}

/** An auction is already live for the guild. */
export class ConflictError extends AuctionError {
  readonly code: AuctionErrorCode = 'CONFLICT';
}

export class TransportError extends AuctionError {
  readonly code: AuctionErrorCode = 'TRANSPORT';
  readonly retryable: boolean = true;
}

/** Fatal for the channel it was raised on; never retried. */
export class TransportPermissionError extends TransportError {
  override readonly code: AuctionErrorCode = 'TRANSPORT_PERMISSION';
  override readonly retryable: boolean = false;
}

export class StorageError extends AuctionError {
  readonly code: AuctionErrorCode = 'STORAGE';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorStack(err: unknown): string | undefined {
  return err instanceof Error ? err.stack : undefined;
}
