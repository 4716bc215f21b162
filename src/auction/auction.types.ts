import type { AuctionErrorCode } from '../common/errors';
import type { ConnectionStatus, StoredAuction } from '../persistence/persistence.types';
import type { Auction, AuctionOutcome, Bid } from './engine';
import type { PanelStatus } from './panel-renderer.service';

export interface FailureData {
  code: AuctionErrorCode | 'INTERNAL';
  leadingBid?: number;
  leadingBidderId?: string | null;
  minimumNextBid?: number;
  retryAfterMs?: number;
}

/** Shape every command hands back to the chat adapter. */
export type CommandResult<T> =
  | { success: true; message: string; data: T }
  | { success: false; message: string; data: FailureData };

export interface OpenAuctionCommand {
  channelId: string;
  startBid?: string | number;
  minIncrement?: string | number;
  durationMinutes?: number;
  secret?: string;
}

/** Exactly one of `amount` and `increment`. */
export interface PlaceBidCommand {
  amount?: string | number;
  increment?: string | number;
}

export interface ManageAuctionCommand {
  secret?: string;
}

export interface AuctionView {
  auction: Auction;
  bidCount: number;
  nextMinimumBid: number;
}

export interface BidView {
  auctionId: string;
  bid: Bid;
  previousBid: number | null;
  /** Display delta against the previous leading amount, e.g. `+50K`. */
  delta: string;
  nextMinimumBid: number;
  revertedFromCountdown: boolean;
}

export interface UndoView {
  auctionId: string;
  removed: Bid;
  currentBid: number | null;
  currentBidderId: string | null;
}

export interface EndView {
  auction: Auction;
  outcome: AuctionOutcome;
}

export interface DebugStatusView {
  liveAuctions: number;
  monitors: number;
  storage: ConnectionStatus;
  auctionId: string | null;
}

export interface DebugAuctionView {
  auction: Auction;
  recentBids: Bid[];
  bidCount: number;
  nextMinimumBid: number;
  monitorRunning: boolean;
  locked: boolean;
  panel: PanelStatus;
}

export interface ReconnectView {
  reconnected: boolean;
  storage: ConnectionStatus;
}

export type RecentAuctionsView = StoredAuction[];
