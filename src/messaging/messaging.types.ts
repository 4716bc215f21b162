import type { AuctionStatus, PanelReference } from '../auction/engine';

export const MESSAGING_TRANSPORT = Symbol('MESSAGING_TRANSPORT');

export type MessageRef = PanelReference;

/** Live auction panel. Formatting into platform markup happens in the adapter. */
export interface PanelPayload {
  kind: 'auction_panel';
  auctionId: string;
  guildId: string;
  status: AuctionStatus;
  startBid: number;
  minIncrement: number;
  currentBid: number | null;
  currentBidderId: string | null;
  nextMinimumBid: number;
  bidCount: number;
  currency: string;
  countdownRemainingSec: number | null;
  display: {
    startBid: string;
    minIncrement: string;
    currentBid: string;
    nextMinimumBid: string;
  };
}

/** Terminal panel content written at finalize. */
export interface SummaryPayload {
  kind: 'auction_summary';
  auctionId: string;
  guildId: string;
  winnerId: string | null;
  finalPrice: number;
  commission: number;
  commissionPct: number;
  bidCount: number;
  currency: string;
  endedAt: number;
  display: {
    finalPrice: string;
    commission: string;
  };
}

export interface PromoPayload {
  kind: 'promo';
  auctionId: string;
  /** Contains a `{leader}` token for the adapter to render as a mention. */
  text: string;
  leaderId: string | null;
  amount: number;
  currency: string;
}

export interface LoggedBid {
  rank: number;
  bidderId: string;
  amount: number;
  display: string;
}

export interface AuctionLogPayload {
  kind: 'auction_log';
  event: 'started' | 'ended';
  auctionId: string;
  guildId: string;
  channelId: string;
  startedBy: string;
  startBid: number;
  minIncrement: number;
  currency: string;
  winnerId: string | null;
  finalPrice: number | null;
  commission: number | null;
  commissionPct: number;
  bidCount: number;
  uniqueBidders: number;
  totalVolume: number;
  durationSec: number | null;
  topBids: LoggedBid[];
}

export type DisplayPayload =
  | PanelPayload
  | SummaryPayload
  | PromoPayload
  | AuctionLogPayload;

/**
 * Outbound chat messages. Implementations raise TransportError for transient
 * failures and TransportPermissionError when the channel refuses the bot.
 */
export interface MessagingTransport {
  send(channelId: string, payload: DisplayPayload): Promise<MessageRef>;
  edit(ref: MessageRef, payload: DisplayPayload): Promise<void>;
  delete(ref: MessageRef): Promise<void>;
}
