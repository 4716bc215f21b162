import type {
  BidValidationError,
  ConcurrencyConflict,
  StateError,
  ValidationError,
} from '../../common/errors';

/**
 * Auction phases: OPEN → COUNTDOWN → ENDED, or OPEN → ENDED.
 * COUNTDOWN returns to OPEN when a bid arrives.
 */
export type AuctionStatus = 'OPEN' | 'COUNTDOWN' | 'ENDED';

/** Opaque handle to the panel message the transport returned. */
export interface PanelReference {
  channelId: string;
  messageId: string;
}

/**
 * Single source of truth for one auction. Timestamps are epoch milliseconds.
 */
export interface Auction {
  id: string;
  guildId: string;
  channelId: string;
  status: AuctionStatus;
  startBid: number;
  minIncrement: number;
  /** null until the first bid is accepted */
  currentBid: number | null;
  currentBidderId: string | null;
  commissionPct: number;
  currencyName: string;
  startedBy: string;
  durationMinutes: number;
  startedAt: number;
  /** Informational; the monitor finalizes on inactivity, not on this. */
  endsAt: number;
  countdownDeadline: number | null;
  lastActivityAt: number;
  endedAt: number | null;
  panelReference: PanelReference | null;
}

export interface Bid {
  id: string;
  auctionId: string;
  bidderId: string;
  amount: number;
  sequenceNo: number;
  createdAt: number;
}

/** Copy of an auction plus its bids, safe to hand outside the lock. */
export interface AuctionSnapshot {
  auction: Auction;
  bids: Bid[];
  nextSequenceNo: number;
}

export interface BidLimits {
  minBidAmount: number;
  maxBidAmount: number;
}

export interface DurationLimits {
  minDurationMin: number;
  maxDurationMin: number;
}

export interface OpenAuctionInput {
  id: string;
  guildId: string;
  channelId: string;
  startedBy: string;
  startBid: number;
  minIncrement: number;
  durationMinutes: number;
  commissionPct: number;
  currencyName: string;
  now: number;
}

export type PlaceBidResult =
  | { accepted: true; bid: Bid; revertedFromCountdown: boolean }
  | {
      accepted: false;
      error: BidValidationError | ConcurrencyConflict | StateError | ValidationError;
    };

export type UndoBidResult =
  | { undone: true; removed: Bid; currentBid: number | null }
  | { undone: false; error: StateError };

export type EnterCountdownResult =
  | { started: true; deadline: number }
  | { started: false; error: StateError };

export interface AuctionOutcome {
  auctionId: string;
  winnerId: string | null;
  /** Winning bid, or the start bid when nobody bid. */
  finalPrice: number;
  commission: number;
  bidCount: number;
  uniqueBidders: number;
  totalVolume: number;
  endedAt: number;
}

export type EndAuctionResult =
  | { ended: true; outcome: AuctionOutcome }
  | { ended: false; error: StateError };
