import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { AUCTION_SETTINGS } from '../config/config.module';
import type { AuctionSettings } from '../config/configuration';
import {
  MESSAGING_TRANSPORT,
  type MessagingTransport,
} from '../messaging/messaging.types';
import { logPayload } from './auction-payloads';
import type { AuctionOutcome, AuctionSnapshot } from './engine';

/** Posts auction start and end reports to the guild's log channel, if any. */
@Injectable()
export class AuctionLogService {
  private readonly logger = new Logger(AuctionLogService.name);

  constructor(
    @Inject(MESSAGING_TRANSPORT) private readonly transport: MessagingTransport,
    @Inject(AUCTION_SETTINGS) private readonly settings: AuctionSettings,
  ) {}

  async logStarted(logChannelId: string | null, snapshot: AuctionSnapshot): Promise<boolean> {
    return this.post(logChannelId, snapshot, null);
  }

  async logEnded(
    logChannelId: string | null,
    snapshot: AuctionSnapshot,
    outcome: AuctionOutcome,
  ): Promise<boolean> {
    return this.post(logChannelId, snapshot, outcome);
  }

  private async post(
    logChannelId: string | null,
    snapshot: AuctionSnapshot,
    outcome: AuctionOutcome | null,
  ): Promise<boolean> {
    if (logChannelId === null) return false;
    const payload = logPayload(snapshot, outcome, this.settings.bidHistoryDisplay);
    try {
      await this.transport.send(logChannelId, payload);
      return true;
    } catch (err) {
      this.logger.warn(
        `Could not post ${payload.event} log for auction ${snapshot.auction.id} to ${logChannelId}: ${errorMessage(err)}`,
      );
      return false;
    }
  }
}
