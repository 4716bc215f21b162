import type {
  AuctionLogPayload,
  LoggedBid,
  PanelPayload,
  PromoPayload,
  SummaryPayload,
} from '../messaging/messaging.types';
import { fmtAmount, minimumNextBid } from './engine';
import type { AuctionOutcome, AuctionSnapshot } from './engine';

export function panelPayload(snapshot: AuctionSnapshot, now: number): PanelPayload {
  const { auction, bids } = snapshot;
  const next = minimumNextBid(auction);
  const remaining =
    auction.status === 'COUNTDOWN' && auction.countdownDeadline !== null
      ? Math.max(0, Math.ceil((auction.countdownDeadline - now) / 1000))
      : null;
  return {
    kind: 'auction_panel',
    auctionId: auction.id,
    guildId: auction.guildId,
    status: auction.status,
    startBid: auction.startBid,
    minIncrement: auction.minIncrement,
    currentBid: auction.currentBid,
    currentBidderId: auction.currentBidderId,
    nextMinimumBid: next,
    bidCount: bids.length,
    currency: auction.currencyName,
    countdownRemainingSec: remaining,
    display: {
      startBid: fmtAmount(auction.startBid),
      minIncrement: fmtAmount(auction.minIncrement),
      currentBid: fmtAmount(auction.currentBid, 'No bids yet'),
      nextMinimumBid: fmtAmount(next),
    },
  };
}

export function summaryPayload(
  snapshot: AuctionSnapshot,
  outcome: AuctionOutcome,
): SummaryPayload {
  const { auction } = snapshot;
  return {
    kind: 'auction_summary',
    auctionId: auction.id,
    guildId: auction.guildId,
    winnerId: outcome.winnerId,
    finalPrice: outcome.finalPrice,
    commission: outcome.commission,
    commissionPct: auction.commissionPct,
    bidCount: outcome.bidCount,
    currency: auction.currencyName,
    endedAt: outcome.endedAt,
    display: {
      finalPrice: fmtAmount(outcome.finalPrice),
      commission: fmtAmount(outcome.commission),
    },
  };
}

export function promoPayload(snapshot: AuctionSnapshot, text: string): PromoPayload {
  const { auction } = snapshot;
  return {
    kind: 'promo',
    auctionId: auction.id,
    text,
    leaderId: auction.currentBidderId,
    amount: auction.currentBid ?? auction.startBid,
    currency: auction.currencyName,
  };
}

/** Highest bids first, at most `limit`. */
export function topBids(snapshot: AuctionSnapshot, limit: number): LoggedBid[] {
  return [...snapshot.bids]
    .sort((a, b) => b.amount - a.amount || a.sequenceNo - b.sequenceNo)
    .slice(0, Math.max(0, limit))
    .map((bid, i) => ({
      rank: i + 1,
      bidderId: bid.bidderId,
      amount: bid.amount,
      display: fmtAmount(bid.amount),
    }));
}

export function logPayload(
  snapshot: AuctionSnapshot,
  outcome: AuctionOutcome | null,
  historyLimit: number,
): AuctionLogPayload {
  const { auction, bids } = snapshot;
  return {
    kind: 'auction_log',
    event: outcome ? 'ended' : 'started',
    auctionId: auction.id,
    guildId: auction.guildId,
    channelId: auction.channelId,
    startedBy: auction.startedBy,
    startBid: auction.startBid,
    minIncrement: auction.minIncrement,
    currency: auction.currencyName,
    winnerId: outcome ? outcome.winnerId : null,
    finalPrice: outcome ? outcome.finalPrice : null,
    commission: outcome ? outcome.commission : null,
    commissionPct: auction.commissionPct,
    bidCount: outcome ? outcome.bidCount : bids.length,
    uniqueBidders: outcome ? outcome.uniqueBidders : 0,
    totalVolume: outcome ? outcome.totalVolume : 0,
    durationSec: outcome
      ? Math.round((outcome.endedAt - auction.startedAt) / 1000)
      : null,
    topBids: outcome ? topBids(snapshot, historyLimit) : [],
  };
}
