import { Logger } from '@nestjs/common';
import { auctionSettings } from '../testing/settings.fixture';
import { AuctionMonitor, evaluateTick } from './auction-monitor.service';

const settings = auctionSettings({ inactivityThresholdSec: 30, monitorTickMs: 1_000 });

describe('evaluateTick', () => {
  const T0 = 1_000_000;

  it('starts the countdown once the auction has been idle for the threshold', () => {
    const open = { status: 'OPEN' as const, lastActivityAt: T0, countdownDeadline: null };
    expect(evaluateTick(open, T0 + 29_900, settings)).toEqual({ action: 'none' });
    expect(evaluateTick(open, T0 + 30_000, settings)).toEqual({ action: 'countdown' });
  });

  it('refreshes during the countdown and finalizes at the deadline', () => {
    const countdown = {
      status: 'COUNTDOWN' as const,
      lastActivityAt: T0,
      countdownDeadline: T0 + 33_000,
    };
    expect(evaluateTick(countdown, T0 + 30_500, settings)).toEqual({
      action: 'refresh',
      remainingSec: 3,
    });
    expect(evaluateTick(countdown, T0 + 33_000, settings)).toEqual({ action: 'finalize' });
  });

  it('does nothing for ended auctions', () => {
    const ended = { status: 'ENDED' as const, lastActivityAt: T0, countdownDeadline: null };
    expect(evaluateTick(ended, T0 + 999_999, settings)).toEqual({ action: 'none' });
  });
});

describe('AuctionMonitor', () => {
  let monitor: AuctionMonitor;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    monitor = new AuctionMonitor(settings);
  });

  afterEach(() => {
    monitor.onModuleDestroy();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('ticks once per interval until stopped', async () => {
    const tick = jest.fn(async () => undefined);
    monitor.start('a1', tick);

    await jest.advanceTimersByTimeAsync(3_000);
    expect(tick).toHaveBeenCalledTimes(3);

    monitor.stop('a1');
    expect(monitor.isRunning('a1')).toBe(false);
    await jest.advanceTimersByTimeAsync(3_000);
    expect(tick).toHaveBeenCalledTimes(3);
  });

  it('never overlaps a tick that is still running', async () => {
    let release: () => void = () => undefined;
    const tick = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    monitor.start('a1', tick);

    await jest.advanceTimersByTimeAsync(3_000);
    expect(tick).toHaveBeenCalledTimes(1);

    release();
    await jest.advanceTimersByTimeAsync(1_000);
    expect(tick).toHaveBeenCalledTimes(2);
  });

  it('keeps ticking after a failure and isolates auctions', async () => {
    const failing = jest.fn(async () => {
      throw new Error('tick failed');
    });
    const healthy = jest.fn(async () => undefined);
    monitor.start('bad', failing);
    monitor.start('good', healthy);

    await jest.advanceTimersByTimeAsync(2_000);
    expect(failing).toHaveBeenCalledTimes(2);
    expect(healthy).toHaveBeenCalledTimes(2);
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Monitor tick for auction bad failed: tick failed',
      expect.any(String),
    );
    expect(monitor.size).toBe(2);
  });
});
