import { BidValidationError, StateError, ValidationError } from '../../common/errors';
import { calculateCommission, minimumNextBid, validateAmount } from './bid-amount';
import type {
  Auction,
  AuctionOutcome,
  AuctionSnapshot,
  Bid,
  BidLimits,
  DurationLimits,
  EndAuctionResult,
  EnterCountdownResult,
  OpenAuctionInput,
  PlaceBidResult,
  UndoBidResult,
} from './types';

function generateBidId(auctionId: string, sequenceNo: number): string {
  return `${auctionId}-bid-${sequenceNo}`;
}

/**
 * Validate the parameters of an open request. Returns null when they are usable.
 */
export function validateOpenParams(
  params: Pick<OpenAuctionInput, 'startBid' | 'minIncrement' | 'durationMinutes'>,
  limits: DurationLimits,
): ValidationError | null {
  if (!Number.isSafeInteger(params.startBid) || params.startBid <= 0) {
    return new ValidationError('Starting bid must be a positive whole number');
  }
  if (!Number.isSafeInteger(params.minIncrement) || params.minIncrement <= 0) {
    return new ValidationError('Minimum increment must be a positive whole number');
  }
  if (
    !Number.isInteger(params.durationMinutes) ||
    params.durationMinutes < limits.minDurationMin ||
    params.durationMinutes > limits.maxDurationMin
  ) {
    return new ValidationError(
      `Duration must be between ${limits.minDurationMin} and ${limits.maxDurationMin} minutes`,
    );
  }
  return null;
}

/**
 * Pure auction state machine: deterministic, no timers, no I/O.
 * Callers serialize access through the registry lock; time is passed in.
 */
export class AuctionEngine {
  private auction: Auction;
  private bids: Bid[] = [];
  private nextSequenceNo = 1;

  constructor(input: OpenAuctionInput) {
    this.auction = {
      id: input.id,
      guildId: input.guildId,
      channelId: input.channelId,
      status: 'OPEN',
      startBid: input.startBid,
      minIncrement: input.minIncrement,
      currentBid: null,
      currentBidderId: null,
      commissionPct: input.commissionPct,
      currencyName: input.currencyName,
      startedBy: input.startedBy,
      durationMinutes: input.durationMinutes,
      startedAt: input.now,
      endsAt: input.now + input.durationMinutes * 60_000,
      countdownDeadline: null,
      lastActivityAt: input.now,
      endedAt: null,
      panelReference: null,
    };
  }

  /** Rebuild an engine from a persisted snapshot (startup recovery). */
  static restore(snapshot: AuctionSnapshot): AuctionEngine {
    const { auction } = snapshot;
    const engine = new AuctionEngine({
      id: auction.id,
      guildId: auction.guildId,
      channelId: auction.channelId,
      startedBy: auction.startedBy,
      startBid: auction.startBid,
      minIncrement: auction.minIncrement,
      durationMinutes: auction.durationMinutes,
      commissionPct: auction.commissionPct,
      currencyName: auction.currencyName,
      now: auction.startedAt,
    });
    engine.setState(snapshot);
    return engine;
  }

  get id(): string {
    return this.auction.id;
  }

  get status(): Auction['status'] {
    return this.auction.status;
  }

  get startBid(): number {
    return this.auction.startBid;
  }

  get nextMinimumBid(): number {
    return minimumNextBid(this.auction);
  }

  get currentBid(): number | null {
    return this.auction.currentBid;
  }

  get currentBidderId(): string | null {
    return this.auction.currentBidderId;
  }

  get lastActivityAt(): number {
    return this.auction.lastActivityAt;
  }

  get countdownDeadline(): number | null {
    return this.auction.countdownDeadline;
  }

  /**
   * Accept or reject a bid against the current state. A bid during COUNTDOWN
   * returns the auction to OPEN and clears the deadline.
   */
  placeBid(
    bidderId: string,
    amount: number,
    now: number,
    limits: BidLimits,
  ): PlaceBidResult {
    if (this.auction.status === 'ENDED') {
      return { accepted: false, error: new StateError('Auction has ended') };
    }
    if (
      this.auction.currentBidderId !== null &&
      this.auction.currentBidderId === bidderId
    ) {
      return {
        accepted: false,
        error: new BidValidationError('You are already the highest bidder'),
      };
    }
    const invalid = validateAmount(amount, this.auction, limits);
    if (invalid) return { accepted: false, error: invalid };

    const sequenceNo = this.nextSequenceNo;
    this.nextSequenceNo += 1;
    const bid: Bid = {
      id: generateBidId(this.auction.id, sequenceNo),
      auctionId: this.auction.id,
      bidderId,
      amount,
      sequenceNo,
      createdAt: now,
    };
    this.bids.push(bid);
    this.auction.currentBid = amount;
    this.auction.currentBidderId = bidderId;
    this.auction.lastActivityAt = now;

    const revertedFromCountdown = this.auction.status === 'COUNTDOWN';
    if (revertedFromCountdown) {
      this.auction.status = 'OPEN';
      this.auction.countdownDeadline = null;
    }
    return { accepted: true, bid: { ...bid }, revertedFromCountdown };
  }

  /**
   * Remove the latest bid. Sequence numbers are not reused afterwards.
   */
  undoLast(): UndoBidResult {
    if (this.auction.status === 'ENDED') {
      return { undone: false, error: new StateError('Auction has ended') };
    }
    const removed = this.bids.pop();
    if (!removed) {
      return { undone: false, error: new StateError('No bids to remove') };
    }
    const latest = this.bids[this.bids.length - 1];
    this.auction.currentBid = latest ? latest.amount : null;
    this.auction.currentBidderId = latest ? latest.bidderId : null;
    return { undone: true, removed, currentBid: this.auction.currentBid };
  }

  /** OPEN → COUNTDOWN with a deadline. */
  enterCountdown(now: number, countdownMs: number): EnterCountdownResult {
    if (this.auction.status !== 'OPEN') {
      return {
        started: false,
        error: new StateError(
          `Countdown cannot start from status ${this.auction.status}`,
        ),
      };
    }
    const deadline = now + countdownMs;
    this.auction.status = 'COUNTDOWN';
    this.auction.countdownDeadline = deadline;
    return { started: true, deadline };
  }

  /** Any non-terminal state → ENDED. A second call is a StateError. */
  end(now: number): EndAuctionResult {
    if (this.auction.status === 'ENDED') {
      return { ended: false, error: new StateError('Auction already ended') };
    }
    this.auction.status = 'ENDED';
    this.auction.countdownDeadline = null;
    this.auction.endedAt = now;
    return { ended: true, outcome: this.outcome(now) };
  }

  setPanelReference(reference: Auction['panelReference']): void {
    this.auction.panelReference = reference ? { ...reference } : null;
  }

  getState(): AuctionSnapshot {
    return structuredClone({
      auction: this.auction,
      bids: this.bids,
      nextSequenceNo: this.nextSequenceNo,
    });
  }

  setState(snapshot: AuctionSnapshot): void {
    const copy = structuredClone(snapshot);
    const highestSeq = copy.bids.reduce((max, b) => Math.max(max, b.sequenceNo), 0);
    this.auction = copy.auction;
    this.bids = [...copy.bids].sort((a, b) => a.sequenceNo - b.sequenceNo);
    this.nextSequenceNo = Math.max(copy.nextSequenceNo, highestSeq + 1);
  }

  private outcome(now: number): AuctionOutcome {
    const winner = this.bids[this.bids.length - 1] ?? null;
    const finalPrice = winner ? winner.amount : this.auction.startBid;
    return {
      auctionId: this.auction.id,
      winnerId: winner ? winner.bidderId : null,
      finalPrice,
      commission: winner
        ? calculateCommission(finalPrice, this.auction.commissionPct)
        : 0,
      bidCount: this.bids.length,
      uniqueBidders: new Set(this.bids.map((b) => b.bidderId)).size,
      totalVolume: this.bids.reduce((sum, b) => sum + b.amount, 0),
      endedAt: now,
    };
  }
}
