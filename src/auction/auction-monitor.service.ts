import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { errorMessage, errorStack } from '../common/errors';
import { AUCTION_SETTINGS } from '../config/config.module';
import type { AuctionSettings } from '../config/configuration';
import type { Auction } from './engine';

export type TickDecision =
  | { action: 'none' }
  | { action: 'countdown' }
  | { action: 'refresh'; remainingSec: number }
  | { action: 'finalize' };

/** What one monitor tick should do for the given auction state. */
export function evaluateTick(
  auction: Pick<Auction, 'status' | 'lastActivityAt' | 'countdownDeadline'>,
  now: number,
  settings: Pick<AuctionSettings, 'inactivityThresholdSec'>,
): TickDecision {
  switch (auction.status) {
    case 'OPEN':
      return now - auction.lastActivityAt >= settings.inactivityThresholdSec * 1000
        ? { action: 'countdown' }
        : { action: 'none' };
    case 'COUNTDOWN':
      if (auction.countdownDeadline === null || now >= auction.countdownDeadline) {
        return { action: 'finalize' };
      }
      return {
        action: 'refresh',
        remainingSec: Math.ceil((auction.countdownDeadline - now) / 1000),
      };
    case 'ENDED':
      return { action: 'none' };
  }
}

export type TickHandler = () => Promise<void>;

interface MonitorEntry {
  timer: ReturnType<typeof setInterval>;
  inFlight: boolean;
}

/**
 * One interval per live auction. A tick is skipped while the previous one is
 * still running; a failing tick is logged and the interval keeps going.
 */
@Injectable()
export class AuctionMonitor implements OnModuleDestroy {
  private readonly logger = new Logger(AuctionMonitor.name);
  private readonly monitors = new Map<string, MonitorEntry>();

  constructor(
    @Inject(AUCTION_SETTINGS) private readonly settings: AuctionSettings,
  ) {}

  start(auctionId: string, tick: TickHandler): void {
    this.stop(auctionId);
    const entry: MonitorEntry = {
      inFlight: false,
      timer: setInterval(() => {
        if (entry.inFlight) return;
        entry.inFlight = true;
        tick()
          .catch((err) =>
            this.logger.error(
              `Monitor tick for auction ${auctionId} failed: ${errorMessage(err)}`,
              errorStack(err),
            ),
          )
          .finally(() => {
            entry.inFlight = false;
          });
      }, this.settings.monitorTickMs),
    };
    this.monitors.set(auctionId, entry);
  }

  stop(auctionId: string): void {
    const entry = this.monitors.get(auctionId);
    if (!entry) return;
    clearInterval(entry.timer);
    this.monitors.delete(auctionId);
  }

  isRunning(auctionId: string): boolean {
    return this.monitors.has(auctionId);
  }

  get size(): number {
    return this.monitors.size;
  }

  onModuleDestroy(): void {
    for (const auctionId of [...this.monitors.keys()]) {
      this.stop(auctionId);
    }
  }
}
