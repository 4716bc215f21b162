import { BidValidationError, StateError } from '../../common/errors';
import { AuctionEngine, validateOpenParams } from './auction-engine';
import type { OpenAuctionInput } from './types';

const limits = { minBidAmount: 1_000, maxBidAmount: 1_000_000_000_000 };
const T0 = 1_700_000_000_000;

const createInput = (overrides: Partial<OpenAuctionInput> = {}): OpenAuctionInput => ({
  id: 'auction-1',
  guildId: 'guild-1',
  channelId: 'channel-1',
  startedBy: 'admin-1',
  startBid: 250_000,
  minIncrement: 50_000,
  durationMinutes: 5,
  commissionPct: 20,
  currencyName: 'Credits',
  now: T0,
  ...overrides,
});

describe('AuctionEngine (isolated)', () => {
  let engine: AuctionEngine;

  beforeEach(() => {
    engine = new AuctionEngine(createInput());
  });

  describe('open', () => {
    it('starts OPEN with no bids', () => {
      const { auction, bids, nextSequenceNo } = engine.getState();
      expect(auction.status).toBe('OPEN');
      expect(auction.currentBid).toBeNull();
      expect(auction.currentBidderId).toBeNull();
      expect(auction.lastActivityAt).toBe(T0);
      expect(auction.endsAt).toBe(T0 + 5 * 60_000);
      expect(bids).toEqual([]);
      expect(nextSequenceNo).toBe(1);
    });

    it('validates open parameters', () => {
      const duration = { minDurationMin: 1, maxDurationMin: 1_440 };
      expect(
        validateOpenParams({ startBid: 250_000, minIncrement: 50_000, durationMinutes: 5 }, duration),
      ).toBeNull();
      expect(
        validateOpenParams({ startBid: 0, minIncrement: 50_000, durationMinutes: 5 }, duration)
          ?.message,
      ).toBe('Starting bid must be a positive whole number');
      expect(
        validateOpenParams({ startBid: 250_000, minIncrement: -1, durationMinutes: 5 }, duration)
          ?.message,
      ).toBe('Minimum increment must be a positive whole number');
      expect(
        validateOpenParams({ startBid: 250_000, minIncrement: 50_000, durationMinutes: 1_441 }, duration)
          ?.message,
      ).toBe('Duration must be between 1 and 1440 minutes');
    });
  });

  describe('placeBid', () => {
    it('accepts a valid bid and records it', () => {
      const result = engine.placeBid('alice', 250_000, T0 + 1_000, limits);
      expect(result).toEqual({
        accepted: true,
        revertedFromCountdown: false,
        bid: {
          id: 'auction-1-bid-1',
          auctionId: 'auction-1',
          bidderId: 'alice',
          amount: 250_000,
          sequenceNo: 1,
          createdAt: T0 + 1_000,
        },
      });
      expect(engine.currentBid).toBe(250_000);
      expect(engine.currentBidderId).toBe('alice');
      expect(engine.lastActivityAt).toBe(T0 + 1_000);
    });

    it('rejects a bid below the increment without mutating', () => {
      engine.placeBid('alice', 300_000, T0, limits);
      const before = engine.getState();
      const result = engine.placeBid('bob', 320_000, T0 + 5, limits);
      expect(result.accepted).toBe(false);
      if (!result.accepted) expect(result.error).toBeInstanceOf(BidValidationError);
      expect(engine.getState()).toEqual(before);
    });

    it('rejects the leader outbidding themselves', () => {
      engine.placeBid('alice', 300_000, T0, limits);
      const result = engine.placeBid('alice', 400_000, T0, limits);
      expect(result.accepted).toBe(false);
      if (!result.accepted) {
        expect(result.error.message).toBe('You are already the highest bidder');
      }
    });

    it('reverts COUNTDOWN to OPEN and clears the deadline', () => {
      engine.enterCountdown(T0 + 30_000, 3_000);
      const result = engine.placeBid('bob', 250_000, T0 + 31_000, limits);
      expect(result.accepted && result.revertedFromCountdown).toBe(true);
      expect(engine.status).toBe('OPEN');
      expect(engine.countdownDeadline).toBeNull();
    });

    it('rejects bids once ENDED', () => {
      engine.end(T0);
      const result = engine.placeBid('bob', 250_000, T0, limits);
      expect(result.accepted).toBe(false);
      if (!result.accepted) {
        expect(result.error).toBeInstanceOf(StateError);
        expect(result.error.message).toBe('Auction has ended');
      }
    });
  });

  describe('undoLast', () => {
    it('restores the previous leader and never reuses sequence numbers', () => {
      engine.placeBid('a', 300_000, T0, limits);
      engine.placeBid('b', 350_000, T0, limits);
      engine.placeBid('c', 400_000, T0, limits);

      const undone = engine.undoLast();
      expect(undone.undone && undone.removed.sequenceNo).toBe(3);
      expect(engine.currentBid).toBe(350_000);
      expect(engine.currentBidderId).toBe('b');

      const next = engine.placeBid('d', 400_000, T0, limits);
      expect(next.accepted && next.bid.sequenceNo).toBe(4);
    });

    it('goes back to no leader after the only bid is removed', () => {
      engine.placeBid('a', 250_000, T0, limits);
      expect(engine.undoLast()).toEqual(expect.objectContaining({ undone: true, currentBid: null }));
      expect(engine.currentBidderId).toBeNull();
    });

    it('fails with no bids', () => {
      const result = engine.undoLast();
      expect(result.undone).toBe(false);
      if (!result.undone) expect(result.error.message).toBe('No bids to remove');
    });
  });

  describe('countdown and end', () => {
    it('enters countdown only from OPEN', () => {
      expect(engine.enterCountdown(T0 + 30_000, 3_000)).toEqual({
        started: true,
        deadline: T0 + 33_000,
      });
      const again = engine.enterCountdown(T0 + 31_000, 3_000);
      expect(again.started).toBe(false);
      if (!again.started) {
        expect(again.error.message).toBe('Countdown cannot start from status COUNTDOWN');
      }
    });

    it('ends with the winner, commission and totals', () => {
      engine.placeBid('a', 300_000, T0, limits);
      engine.placeBid('b', 350_000, T0, limits);
      engine.placeBid('a', 1_000_000, T0, limits);

      const result = engine.end(T0 + 60_000);
      expect(result).toEqual({
        ended: true,
        outcome: {
          auctionId: 'auction-1',
          winnerId: 'a',
          finalPrice: 1_000_000,
          commission: 200_000,
          bidCount: 3,
          uniqueBidders: 2,
          totalVolume: 1_650_000,
          endedAt: T0 + 60_000,
        },
      });
      expect(engine.status).toBe('ENDED');
    });

    it('ends without bids at the start bid and no commission', () => {
      const result = engine.end(T0);
      expect(result.ended && result.outcome).toEqual(
        expect.objectContaining({ winnerId: null, finalPrice: 250_000, commission: 0 }),
      );
    });

    it('a second end is a StateError', () => {
      engine.end(T0);
      const second = engine.end(T0 + 1);
      expect(second.ended).toBe(false);
      if (!second.ended) expect(second.error.message).toBe('Auction already ended');
    });
  });

  describe('snapshots', () => {
    it('restores an engine from its persisted state', () => {
      engine.placeBid('a', 300_000, T0, limits);
      engine.undoLast();
      engine.placeBid('b', 300_000, T0 + 10, limits);
      engine.setPanelReference({ channelId: 'channel-1', messageId: 'm-1' });

      const restored = AuctionEngine.restore(engine.getState());
      expect(restored.getState()).toEqual(engine.getState());
      const next = restored.placeBid('c', 350_000, T0 + 20, limits);
      expect(next.accepted && next.bid.sequenceNo).toBe(3);
    });

    it('hands out copies', () => {
      const state = engine.getState();
      state.auction.currentBid = 999;
      expect(engine.currentBid).toBeNull();
    });
  });
});
