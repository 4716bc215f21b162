import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import {
  AuctionError,
  BidParseError,
  BidValidationError,
  ConcurrencyConflict,
  ConflictError,
  PermissionError,
  StateError,
  ThrottledError,
  ValidationError,
  errorMessage,
  errorStack,
} from '../common/errors';
import { AUCTION_SETTINGS } from '../config/config.module';
import type { AuctionSettings } from '../config/configuration';
import {
  GUILD_CONFIG_PROVIDER,
  type GuildConfig,
  type GuildConfigProvider,
} from '../guild-config/guild-config.types';
import {
  MESSAGING_TRANSPORT,
  type MessageRef,
  type MessagingTransport,
} from '../messaging/messaging.types';
import { PersistenceGateway } from '../persistence/persistence.gateway';
import type { StoredAuction } from '../persistence/persistence.types';
import { BID_THROTTLE, type BidThrottle } from '../redis/bid-throttle';
import { AuctionLogService } from './auction-log.service';
import { AuctionMonitor, evaluateTick } from './auction-monitor.service';
import { panelPayload, promoPayload, summaryPayload } from './auction-payloads';
import { AuctionRegistry } from './auction-registry';
import type {
  AuctionView,
  BidView,
  CommandResult,
  DebugAuctionView,
  DebugStatusView,
  EndView,
  FailureData,
  ManageAuctionCommand,
  OpenAuctionCommand,
  PlaceBidCommand,
  ReconnectView,
  RecentAuctionsView,
  UndoView,
} from './auction.types';
import {
  AuctionEngine,
  compareAmounts,
  fmtAmount,
  parseAmount,
  validateAmount,
  validateOpenParams,
} from './engine';
import type { Auction, AuctionOutcome, AuctionSnapshot } from './engine';
import {
  canBid,
  canManageAuction,
  canOpenAuction,
  type Actor,
  type PermissionCheck,
} from './permissions';
import { PanelRenderer } from './panel-renderer.service';
import { PromoPicker } from './promo-picker';

type BidRequest =
  | { kind: 'amount'; amount: number }
  | { kind: 'increment'; increment: number };

interface Finalized {
  snapshot: AuctionSnapshot;
  outcome: AuctionOutcome;
}

function toAmount(value: string | number, field: string): number {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new BidParseError(`${field} must be a whole number`);
    }
    return value;
  }
  return parseAmount(value);
}

function toAuction(stored: StoredAuction): Auction {
  const { finalPrice: _finalPrice, winnerId: _winnerId, ...auction } = stored;
  return auction;
}

function ok<T>(message: string, data: T): CommandResult<T> {
  return { success: true, message, data };
}

/**
 * Orchestrates the auction lifecycle for every guild.
 *
 * State changes happen on the engine under the guild lock; persistence,
 * rendering and logging run after the lock is released. Persistence writes
 * for one guild are queued so they reach storage in the order they were made.
 */
@Injectable()
export class AuctionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(AuctionService.name);
  private readonly writeQueues = new Map<string, Promise<void>>();
  private readonly effects = new Set<Promise<void>>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly registry: AuctionRegistry,
    private readonly persistence: PersistenceGateway,
    private readonly monitor: AuctionMonitor,
    private readonly renderer: PanelRenderer,
    private readonly auctionLog: AuctionLogService,
    private readonly promos: PromoPicker,
    @Inject(MESSAGING_TRANSPORT) private readonly transport: MessagingTransport,
    @Inject(GUILD_CONFIG_PROVIDER) private readonly guildConfig: GuildConfigProvider,
    @Inject(BID_THROTTLE) private readonly throttle: BidThrottle,
    @Inject(AUCTION_SETTINGS) private readonly settings: AuctionSettings,
  ) {}

  /* ------------------------------------------------------------------ */
  /*  RECOVERY: re-hydrate live auctions on startup                      */
  /* ------------------------------------------------------------------ */

  async onModuleInit(): Promise<void> {
    this.unsubscribe = this.persistence.onStatusChange((status) => {
      if (status === 'DEGRADED') this.mirrorLiveAuctions();
    });

    const stored = await this.persistence.getActiveAuctions();
    let recovered = 0;
    for (const row of stored) {
      if (this.registry.get(row.guildId)) {
        this.logger.warn(
          `Skipping auction ${row.id}: guild ${row.guildId} already has a live auction`,
        );
        continue;
      }
      const bids = await this.persistence.getBids(row.id);
      const engine = AuctionEngine.restore({
        auction: toAuction(row),
        bids,
        nextSequenceNo: bids.reduce((max, b) => Math.max(max, b.sequenceNo), 0) + 1,
      });
      await this.registry.withGuildLock(row.guildId, () => {
        this.registry.register(row.guildId, engine);
        this.startMonitor(row.guildId, engine.id);
      });
      this.trackPanel(engine.getState());
      recovered += 1;
    }
    this.logger.log(`Recovered ${recovered} live auction(s) from storage`);
  }

  async onModuleDestroy(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const guildId of this.registry.guildIds()) {
      const entry = this.registry.get(guildId);
      if (entry) this.monitor.stop(entry.engine.id);
    }
    await this.settle();
  }

  /* ------------------------------------------------------------------ */
  /*  COMMANDS                                                           */
  /* ------------------------------------------------------------------ */

  async open(
    guildId: string,
    actor: Actor,
    command: OpenAuctionCommand,
  ): Promise<CommandResult<AuctionView>> {
    try {
      const config = await this.guildConfig.getGuildConfig(guildId);
      this.authorize(canOpenAuction(command.channelId, command.secret), actor, config);

      const params = {
        startBid:
          command.startBid === undefined
            ? this.settings.defaultStartBid
            : toAmount(command.startBid, 'Starting bid'),
        minIncrement:
          command.minIncrement === undefined
            ? this.settings.defaultMinIncrement
            : toAmount(command.minIncrement, 'Minimum increment'),
        durationMinutes: command.durationMinutes ?? this.settings.defaultDurationMin,
      };
      const invalid = validateOpenParams(params, this.settings);
      if (invalid) throw invalid;

      const snapshot = await this.registry.withGuildLock(guildId, () => {
        if (this.registry.get(guildId)) {
          throw new ConflictError('An auction is already running in this guild');
        }
        const engine = new AuctionEngine({
          id: randomUUID(),
          guildId,
          channelId: command.channelId,
          startedBy: actor.userId,
          ...params,
          commissionPct: config.commissionPct,
          currencyName: config.currencyName,
          now: Date.now(),
        });
        this.registry.register(guildId, engine);
        this.startMonitor(guildId, engine.id);
        return engine.getState();
      });

      const { auction } = snapshot;
      this.persist(guildId, 'createAuction', () => this.persistence.createAuction(auction));
      this.trackPanel(snapshot);
      this.runEffect(
        `start log for auction ${auction.id}`,
        this.auctionLog.logStarted(config.logChannelId, snapshot).then(() => undefined),
      );
      this.logger.log(
        `Auction ${auction.id} opened in guild ${guildId} by ${actor.userId} (start ${fmtAmount(auction.startBid)})`,
      );
      return ok(`Auction opened at ${fmtAmount(auction.startBid)} ${auction.currencyName}`, {
        auction,
        bidCount: 0,
        nextMinimumBid: auction.startBid,
      });
    } catch (err) {
      return this.failure(err, 'open', guildId);
    }
  }

  /**
   * Accept a bid. The leading amount the bidder saw is captured on arrival;
   * validation runs against the fresh state under the lock, and a bid that
   * only fails because someone else got in first is a ConcurrencyConflict.
   */
  async placeBid(
    guildId: string,
    actor: Actor,
    command: PlaceBidCommand,
  ): Promise<CommandResult<BidView>> {
    const arrival = this.registry.get(guildId);
    const observed = arrival
      ? { auctionId: arrival.engine.id, currentBid: arrival.engine.currentBid }
      : null;

    try {
      if (!observed) throw new StateError('No active auction in this guild');
      const config = await this.guildConfig.getGuildConfig(guildId);
      this.authorize(canBid, actor, config);
      const request = this.toBidRequest(command);

      const decision = await this.throttle.checkBidThrottle(
        guildId,
        actor.userId,
        this.settings.cooldownSec * 1000,
        this.settings.maxBidsPerMinute,
      );
      if (!decision.allowed) {
        throw new ThrottledError(decision.reason, decision.retryAfterMs);
      }

      const accepted = await this.registry.withGuildLock(guildId, () => {
        const entry = this.registry.get(guildId);
        if (!entry || entry.engine.status === 'ENDED') {
          throw new StateError('No active auction in this guild');
        }
        const { engine } = entry;
        const leading = engine.currentBid;
        const amount =
          request.kind === 'increment'
            ? (leading ?? engine.startBid) + request.increment
            : request.amount;

        const result = engine.placeBid(actor.userId, amount, Date.now(), this.settings);
        if (!result.accepted) {
          const stale =
            request.kind === 'amount' &&
            (engine.id !== observed.auctionId || leading !== observed.currentBid);
          // Only a bid that was valid against what the bidder saw lost a race.
          const validWhenSent =
            stale &&
            validateAmount(
              amount,
              { ...engine.getState().auction, currentBid: observed.currentBid },
              this.settings,
            ) === null;
          if (
            validWhenSent &&
            leading !== null &&
            engine.currentBidderId !== actor.userId &&
            result.error instanceof BidValidationError
          ) {
            throw new ConcurrencyConflict(
              leading,
              engine.currentBidderId,
              engine.nextMinimumBid,
            );
          }
          throw result.error;
        }
        return {
          bid: result.bid,
          previousBid: leading,
          revertedFromCountdown: result.revertedFromCountdown,
          snapshot: engine.getState(),
        };
      });

      const { bid, snapshot, previousBid } = accepted;
      this.persist(guildId, 'addBid', () => this.persistence.addBid(bid, snapshot.auction));
      this.renderer.request(snapshot.auction.id, panelPayload(snapshot, Date.now()));

      return ok(`Bid accepted: ${fmtAmount(bid.amount)} ${snapshot.auction.currencyName}`, {
        auctionId: snapshot.auction.id,
        bid,
        previousBid,
        delta: compareAmounts(bid.amount, previousBid ?? snapshot.auction.startBid),
        nextMinimumBid: snapshot.auction.minIncrement + bid.amount,
        revertedFromCountdown: accepted.revertedFromCountdown,
      });
    } catch (err) {
      return this.failure(err, 'placeBid', guildId);
    }
  }

  async undoLast(
    guildId: string,
    actor: Actor,
    command: ManageAuctionCommand = {},
  ): Promise<CommandResult<UndoView>> {
    try {
      const config = await this.guildConfig.getGuildConfig(guildId);
      this.authorize(canManageAuction(command.secret), actor, config);

      const undone = await this.registry.withGuildLock(guildId, () => {
        const entry = this.registry.get(guildId);
        if (!entry) throw new StateError('No active auction in this guild');
        const result = entry.engine.undoLast();
        if (!result.undone) throw result.error;
        return { removed: result.removed, snapshot: entry.engine.getState() };
      });

      const { removed, snapshot } = undone;
      const { auction } = snapshot;
      this.persist(guildId, 'removeLastBid', () =>
        this.persistence.removeLastBid(removed, auction),
      );
      this.renderer.request(auction.id, panelPayload(snapshot, Date.now()));
      this.logger.log(
        `Bid #${removed.sequenceNo} (${fmtAmount(removed.amount)}) removed from auction ${auction.id} by ${actor.userId}`,
      );
      return ok(
        `Removed bid of ${fmtAmount(removed.amount)}; leading bid is now ${fmtAmount(auction.currentBid, 'none')}`,
        {
          auctionId: auction.id,
          removed,
          currentBid: auction.currentBid,
          currentBidderId: auction.currentBidderId,
        },
      );
    } catch (err) {
      return this.failure(err, 'undoLast', guildId);
    }
  }

  async end(
    guildId: string,
    actor: Actor,
    command: ManageAuctionCommand = {},
  ): Promise<CommandResult<EndView>> {
    try {
      const config = await this.guildConfig.getGuildConfig(guildId);
      this.authorize(canManageAuction(command.secret), actor, config);

      const finalized = await this.finalize(guildId);
      if (!finalized) throw new StateError('No active auction in this guild');
      const { snapshot, outcome } = finalized;
      const currency = snapshot.auction.currencyName;
      return ok(
        outcome.winnerId
          ? `Auction ended: won by ${outcome.winnerId} for ${fmtAmount(outcome.finalPrice)} ${currency}`
          : 'Auction ended with no bids',
        { auction: snapshot.auction, outcome },
      );
    } catch (err) {
      return this.failure(err, 'end', guildId);
    }
  }

  /* ------------------------------------------------------------------ */
  /*  DIAGNOSTICS                                                        */
  /* ------------------------------------------------------------------ */

  debugStatus(guildId: string): CommandResult<DebugStatusView> {
    const entry = this.registry.get(guildId);
    const storage = this.persistence.getConnectionStatus();
    return ok(`Storage ${storage.status} on ${storage.activeBackend}`, {
      liveAuctions: this.registry.size,
      monitors: this.monitor.size,
      storage,
      auctionId: entry ? entry.engine.id : null,
    });
  }

  debugAuction(guildId: string): CommandResult<DebugAuctionView> {
    const entry = this.registry.get(guildId);
    if (!entry) return this.failure(new StateError('No active auction in this guild'));
    const snapshot = entry.engine.getState();
    const { auction, bids } = snapshot;
    return ok(`Auction ${auction.id} is ${auction.status}`, {
      auction,
      recentBids: bids.slice(-this.settings.bidHistoryDisplay).reverse(),
      bidCount: bids.length,
      nextMinimumBid: entry.engine.nextMinimumBid,
      monitorRunning: this.monitor.isRunning(auction.id),
      locked: this.registry.isLocked(guildId),
      panel: this.renderer.status(auction.id),
    });
  }

  async recentAuctions(
    guildId: string,
    limit = this.settings.bidHistoryDisplay,
  ): Promise<CommandResult<RecentAuctionsView>> {
    const auctions = await this.persistence.getRecentAuctions(guildId, limit);
    return ok(`${auctions.length} auction(s)`, auctions);
  }

  async reconnectStorage(): Promise<CommandResult<ReconnectView>> {
    const reconnected = await this.persistence.reconnect();
    const storage = this.persistence.getConnectionStatus();
    return ok(
      reconnected
        ? `Storage is ACTIVE on ${storage.activeBackend}`
        : `Primary still unreachable; ${storage.pendingReplay} write(s) pending`,
      { reconnected, storage },
    );
  }

  /** Resolves once queued writes, panel renders and side effects have settled. */
  async settle(): Promise<void> {
    do {
      await Promise.all([
        ...this.writeQueues.values(),
        ...this.effects,
        this.renderer.whenAllIdle(),
      ]);
    } while (this.writeQueues.size > 0 || this.effects.size > 0);
  }

  /* ------------------------------------------------------------------ */
  /*  MONITOR                                                            */
  /* ------------------------------------------------------------------ */

  private startMonitor(guildId: string, auctionId: string): void {
    this.monitor.start(auctionId, () => this.tick(guildId, auctionId));
  }

  /**
   * One monitor tick. The decision and the transition it calls for happen in
   * the same lock hold, so a bid queued behind the tick sees the result.
   */
  private async tick(guildId: string, auctionId: string): Promise<void> {
    const step = await this.registry.withGuildLock(guildId, () => {
      const entry = this.registry.get(guildId);
      if (!entry || entry.engine.id !== auctionId || entry.engine.status === 'ENDED') {
        this.monitor.stop(auctionId);
        return null;
      }
      const now = Date.now();
      const decision = evaluateTick(entry.engine.getState().auction, now, this.settings);
      if (decision.action === 'countdown') {
        const result = entry.engine.enterCountdown(now, this.settings.countdownSec * 1000);
        if (!result.started) throw result.error;
      }
      const finalized =
        decision.action === 'finalize' ? this.endLocked(guildId, entry.engine, now) : null;
      return { decision, snapshot: entry.engine.getState(), now, finalized };
    });
    if (!step) return;

    const { decision, snapshot, now, finalized } = step;
    switch (decision.action) {
      case 'none':
        return;
      case 'countdown':
        this.logger.log(`Auction ${auctionId} idle; countdown started`);
        this.persist(guildId, 'updateAuction', () =>
          this.persistence.updateAuction(snapshot.auction),
        );
        this.renderer.request(auctionId, panelPayload(snapshot, now));
        await this.sendPromo(snapshot);
        return;
      case 'refresh':
        this.renderer.request(auctionId, panelPayload(snapshot, now));
        return;
      case 'finalize':
        if (finalized) this.afterFinalize(guildId, finalized);
        return;
    }
  }

  private async sendPromo(snapshot: AuctionSnapshot): Promise<void> {
    const { auction } = snapshot;
    const text = this.promos.pick(auction.currentBid ?? auction.startBid, auction.currencyName);
    if (text === null) return;
    await this.transport
      .send(auction.channelId, promoPayload(snapshot, text))
      .catch((err) =>
        this.logger.warn(`Promo for auction ${auction.id} not sent: ${errorMessage(err)}`),
      );
  }

  /** End the guild's live auction on request. */
  private async finalize(guildId: string): Promise<Finalized | null> {
    const finalized = await this.registry.withGuildLock(guildId, (): Finalized | null => {
      const entry = this.registry.get(guildId);
      return entry ? this.endLocked(guildId, entry.engine, Date.now()) : null;
    });
    if (finalized) this.afterFinalize(guildId, finalized);
    return finalized;
  }

  /**
   * Engine transition, deregistration and monitor stop. Callers hold the
   * guild lock.
   */
  private endLocked(guildId: string, engine: AuctionEngine, now: number): Finalized | null {
    const result = engine.end(now);
    if (!result.ended) return null;
    this.registry.deregister(guildId);
    this.monitor.stop(engine.id);
    return { snapshot: engine.getState(), outcome: result.outcome };
  }

  /** Summary, storage write and log report for an auction that just ended. */
  private afterFinalize(guildId: string, finalized: Finalized): void {
    const { snapshot, outcome } = finalized;
    const { auction } = snapshot;
    this.persist(guildId, 'endAuction', () =>
      this.persistence.endAuction(auction, {
        auctionId: auction.id,
        winnerId: outcome.winnerId,
        finalPrice: outcome.finalPrice,
        endedAt: outcome.endedAt,
      }),
    );
    this.runEffect(
      `summary for auction ${auction.id}`,
      this.renderer.finalize(auction.id, summaryPayload(snapshot, outcome)),
    );
    this.runEffect(
      `end log for auction ${auction.id}`,
      this.guildConfig
        .getGuildConfig(guildId)
        .then((config) => this.auctionLog.logEnded(config.logChannelId, snapshot, outcome))
        .then(() => undefined),
    );
    this.logger.log(
      `Auction ${auction.id} ended: winner ${outcome.winnerId ?? 'none'}, final ${fmtAmount(outcome.finalPrice)}, ${outcome.bidCount} bid(s)`,
    );
  }

  /* ------------------------------------------------------------------ */
  /*  SIDE EFFECTS                                                       */
  /* ------------------------------------------------------------------ */

  private trackPanel(snapshot: AuctionSnapshot): void {
    const { auction } = snapshot;
    this.renderer.track(auction.id, auction.channelId, auction.panelReference, (ref) =>
      this.onPanelPosted(auction.guildId, auction.id, ref),
    );
    this.renderer.request(auction.id, panelPayload(snapshot, Date.now()));
  }

  private onPanelPosted(guildId: string, auctionId: string, ref: MessageRef): void {
    this.runEffect(
      `panel reference for auction ${auctionId}`,
      this.registry
        .withGuildLock(guildId, () => {
          const entry = this.registry.get(guildId);
          if (!entry || entry.engine.id !== auctionId) return null;
          entry.engine.setPanelReference(ref);
          return entry.engine.getState().auction;
        })
        .then((auction) => {
          if (auction) {
            this.persist(guildId, 'updateAuction', () => this.persistence.updateAuction(auction));
          }
        }),
    );
  }

  /** Give the secondary full rows for every live auction after a failover. */
  private mirrorLiveAuctions(): void {
    for (const guildId of this.registry.guildIds()) {
      const entry = this.registry.get(guildId);
      if (!entry) continue;
      const snapshot = entry.engine.getState();
      this.persist(guildId, 'saveSnapshot', () => this.persistence.saveSnapshot(snapshot));
    }
  }

  /** Queue a storage write behind earlier writes of the same guild. */
  private persist(guildId: string, label: string, write: () => Promise<boolean>): void {
    const prev = this.writeQueues.get(guildId) ?? Promise.resolve();
    const next: Promise<void> = prev
      .then(write)
      .then((stored) => {
        if (!stored) {
          this.logger.warn(`${label} for guild ${guildId} was not stored durably`);
        }
      })
      .catch((err) =>
        this.logger.error(`${label} for guild ${guildId} failed: ${errorMessage(err)}`, errorStack(err)),
      )
      .finally(() => {
        if (this.writeQueues.get(guildId) === next) this.writeQueues.delete(guildId);
      });
    this.writeQueues.set(guildId, next);
  }

  private runEffect(label: string, effect: Promise<void>): void {
    const tracked: Promise<void> = effect
      .catch((err) =>
        this.logger.error(`${label} failed: ${errorMessage(err)}`, errorStack(err)),
      )
      .finally(() => {
        this.effects.delete(tracked);
      });
    this.effects.add(tracked);
  }

  /* ------------------------------------------------------------------ */
  /*  HELPERS                                                            */
  /* ------------------------------------------------------------------ */

  private authorize(check: PermissionCheck, actor: Actor, config: GuildConfig): void {
    const result = check(actor, config);
    if (!result.ok) throw new PermissionError(result.reason);
  }

  private toBidRequest(command: PlaceBidCommand): BidRequest {
    const hasAmount = command.amount !== undefined;
    const hasIncrement = command.increment !== undefined;
    if (hasAmount === hasIncrement) {
      throw new ValidationError('Provide either an amount or an increment');
    }
    if (command.amount !== undefined) {
      return { kind: 'amount', amount: toAmount(command.amount, 'Amount') };
    }
    const increment = toAmount(command.increment ?? 0, 'Increment');
    if (increment <= 0) throw new ValidationError('Increment must be positive');
    return { kind: 'increment', increment };
  }

  private failure(err: unknown, operation?: string, guildId?: string): CommandResult<never> {
    if (err instanceof AuctionError) {
      const data: FailureData = { code: err.code };
      if (err instanceof ConcurrencyConflict) {
        data.leadingBid = err.leadingBid;
        data.leadingBidderId = err.leadingBidderId;
        data.minimumNextBid = err.minimumNextBid;
      }
      if (err instanceof ThrottledError) data.retryAfterMs = err.retryAfterMs;
      return { success: false, message: err.message, data };
    }
    this.logger.error(
      `${operation ?? 'command'} failed for guild ${guildId ?? '?'}: ${errorMessage(err)}`,
      errorStack(err),
    );
    return {
      success: false,
      message: 'Something went wrong while processing the command',
      data: { code: 'INTERNAL' },
    };
  }
}
