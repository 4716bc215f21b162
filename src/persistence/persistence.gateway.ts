import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { Auction, AuctionSnapshot, Bid } from '../auction/engine';
import { StorageError, errorMessage, errorStack } from '../common/errors';
import type { PersistenceSettings } from '../config/configuration';
import {
  PERSISTENCE_SETTINGS,
  PRIMARY_BACKEND,
  SECONDARY_BACKEND,
  type AuctionEndRecord,
  type BackendStatus,
  type ConnectionStatus,
  type PersistenceBackend,
  type StoredAuction,
} from './persistence.types';

type Operation<T> = (backend: PersistenceBackend) => Promise<T>;

/** One row-level write, kept as data so the journal can collapse repeats. */
type WriteOp =
  | { kind: 'saveAuction'; auction: Auction }
  | { kind: 'saveBid'; bid: Bid }
  | { kind: 'removeBid'; auctionId: string; sequenceNo: number }
  | { kind: 'endAuction'; record: AuctionEndRecord }
  | { kind: 'setSetting'; guildId: string; key: string; value: string; at: number };

interface JournalEntry {
  label: string;
  key: string | null;
  op: WriteOp;
}

function applyOp(backend: PersistenceBackend, op: WriteOp): Promise<void> {
  switch (op.kind) {
    case 'saveAuction':
      return backend.saveAuction(op.auction);
    case 'saveBid':
      return backend.saveBid(op.bid);
    case 'removeBid':
      return backend.removeBid(op.auctionId, op.sequenceNo);
    case 'endAuction':
      return backend.endAuction(op.record);
    case 'setSetting':
      return backend.setSetting(op.guildId, op.key, op.value, op.at);
  }
}

/** Upserts of the same row share a key; the latest one wins on replay. */
function rowKey(op: WriteOp): string | null {
  switch (op.kind) {
    case 'saveAuction':
      return `auction:${op.auction.id}`;
    case 'saveBid':
      return `bid:${op.bid.auctionId}:${op.bid.sequenceNo}`;
    case 'setSetting':
      return `setting:${op.guildId}:${op.key}`;
    default:
      return null;
  }
}

async function applyAll(backend: PersistenceBackend, ops: WriteOp[]): Promise<void> {
  for (const op of ops) {
    await applyOp(backend, op);
  }
}

export type StatusListener = (status: BackendStatus) => void;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * One storage interface over a primary and a secondary backend.
 *
 * Operations go to the primary with bounded retry and exponential backoff.
 * When retries are exhausted the gateway turns DEGRADED and serves everything
 * from the secondary until a reconnect probe succeeds. Writes made while
 * DEGRADED are journaled and replayed against the primary on reconnect; a
 * later upsert of the same row replaces the journaled one in place, so the
 * journal grows with distinct rows rather than with write volume.
 *
 * Public methods never throw: write failures are logged and reported as
 * `false`, read failures return the empty value.
 */
@Injectable()
export class PersistenceGateway implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PersistenceGateway.name);
  private readonly journal: JournalEntry[] = [];
  private readonly listeners = new Set<StatusListener>();
  private status: BackendStatus = 'ACTIVE';
  private primaryReady = false;
  private secondaryReady = false;
  private probeTimer: ReturnType<typeof setInterval> | null = null;
  private reconnecting: Promise<boolean> | null = null;
  private degradedSince: number | null = null;
  private lastError: string | null = null;
  private readonly stats = {
    primaryAttempts: 0,
    primaryFailures: 0,
    consecutivePrimaryFailures: 0,
    secondaryFailures: 0,
    failovers: 0,
    reconnectAttempts: 0,
  };

  constructor(
    @Inject(PRIMARY_BACKEND) private readonly primary: PersistenceBackend,
    @Inject(SECONDARY_BACKEND) private readonly secondary: PersistenceBackend,
    @Inject(PERSISTENCE_SETTINGS) private readonly settings: PersistenceSettings,
  ) {}

  /** Fails startup only when neither backend can be initialized. */
  async onModuleInit(): Promise<void> {
    try {
      await this.withRetry('init', (b) => b.init());
      this.primaryReady = true;
    } catch (err) {
      this.degrade(err, 'init');
    }
    await this.ensureSecondary();
    if (!this.primaryReady && !this.secondaryReady) {
      throw new StorageError(
        `No persistence backend is reachable (${this.primary.name}, ${this.secondary.name})`,
      );
    }
    this.logger.log(
      `Persistence ready: ${this.status === 'ACTIVE' ? this.primary.name : this.secondary.name}`,
    );
  }

  async onModuleDestroy(): Promise<void> {
    this.stopProbe();
    for (const backend of [this.primary, this.secondary]) {
      await backend
        .close()
        .catch((err) =>
          this.logger.warn(`Failed to close ${backend.name}: ${errorMessage(err)}`),
        );
    }
  }

  /* ------------------------------------------------------------------ */
  /*  WRITES                                                             */
  /* ------------------------------------------------------------------ */

  createAuction(auction: Auction): Promise<boolean> {
    return this.write('createAuction', [{ kind: 'saveAuction', auction }]);
  }

  updateAuction(auction: Auction): Promise<boolean> {
    return this.write('updateAuction', [{ kind: 'saveAuction', auction }]);
  }

  /** Full auction row plus every bid; used after failover and on recovery. */
  saveSnapshot(snapshot: Pick<AuctionSnapshot, 'auction' | 'bids'>): Promise<boolean> {
    return this.write('saveSnapshot', [
      { kind: 'saveAuction', auction: snapshot.auction },
      ...snapshot.bids.map((bid): WriteOp => ({ kind: 'saveBid', bid })),
    ]);
  }

  addBid(bid: Bid, auction: Auction): Promise<boolean> {
    return this.write('addBid', [
      { kind: 'saveBid', bid },
      { kind: 'saveAuction', auction },
    ]);
  }

  removeLastBid(removed: Bid, auction: Auction): Promise<boolean> {
    return this.write('removeLastBid', [
      { kind: 'removeBid', auctionId: removed.auctionId, sequenceNo: removed.sequenceNo },
      { kind: 'saveAuction', auction },
    ]);
  }

  endAuction(auction: Auction, record: AuctionEndRecord): Promise<boolean> {
    return this.write('endAuction', [
      { kind: 'saveAuction', auction },
      { kind: 'endAuction', record },
    ]);
  }

  setSetting(guildId: string, key: string, value: string): Promise<boolean> {
    return this.write('setSetting', [
      { kind: 'setSetting', guildId, key, value, at: Date.now() },
    ]);
  }

  /**
   * Copy settings rows onto the secondary only. Used to carry known
   * configuration across a failover; nothing is journaled for replay.
   */
  async mirrorSettings(guildId: string, values: ReadonlyMap<string, string>): Promise<boolean> {
    const at = Date.now();
    const ops = [...values].map(
      ([key, value]): WriteOp => ({ kind: 'setSetting', guildId, key, value, at }),
    );
    return this.onSecondary('mirrorSettings', (b) => applyAll(b, ops), false).then(
      () => true,
      () => false,
    );
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  getAuction(auctionId: string): Promise<StoredAuction | null> {
    return this.read('getAuction', (b) => b.getAuction(auctionId), null);
  }

  getActiveAuction(guildId: string): Promise<StoredAuction | null> {
    return this.read('getActiveAuction', (b) => b.getActiveAuction(guildId), null);
  }

  getActiveAuctions(): Promise<StoredAuction[]> {
    return this.read('getActiveAuctions', (b) => b.getActiveAuctions(), []);
  }

  getBids(auctionId: string): Promise<Bid[]> {
    return this.read('getBids', (b) => b.getBids(auctionId), []);
  }

  getRecentAuctions(guildId: string, limit = 10): Promise<StoredAuction[]> {
    return this.read(
      'getRecentAuctions',
      (b) => b.getRecentAuctions(guildId, limit),
      [],
    );
  }

  getSetting(guildId: string, key: string): Promise<string | null> {
    return this.read('getSetting', (b) => b.getSetting(guildId, key), null);
  }

  /* ------------------------------------------------------------------ */
  /*  HEALTH                                                             */
  /* ------------------------------------------------------------------ */

  getConnectionStatus(): ConnectionStatus {
    return {
      status: this.status,
      activeBackend:
        this.status === 'ACTIVE' ? this.primary.name : this.secondary.name,
      ...this.stats,
      pendingReplay: this.journal.length,
      degradedSince: this.degradedSince,
      lastError: this.lastError,
    };
  }

  onStatusChange(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Probe the primary. On success the journal is replayed and the gateway
   * returns to ACTIVE. Concurrent callers share one probe.
   */
  reconnect(): Promise<boolean> {
    if (this.status === 'ACTIVE') return Promise.resolve(true);
    if (!this.reconnecting) {
      this.reconnecting = this.probe().finally(() => {
        this.reconnecting = null;
      });
    }
    return this.reconnecting;
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  private async write(label: string, ops: WriteOp[]): Promise<boolean> {
    const op: Operation<void> = (b) => applyAll(b, ops);
    if (this.status === 'ACTIVE') {
      try {
        await this.withRetry(label, op);
        return true;
      } catch (err) {
        this.degrade(err, label);
      }
    }
    for (const entry of ops) {
      this.enqueue(label, entry);
    }
    return this.onSecondary(label, op, false).then(() => true, () => false);
  }

  private enqueue(label: string, op: WriteOp): void {
    if (op.kind === 'removeBid') {
      const bidKey = `bid:${op.auctionId}:${op.sequenceNo}`;
      for (let i = this.journal.length - 1; i >= 0; i -= 1) {
        if (this.journal[i]?.key === bidKey) this.journal.splice(i, 1);
      }
    }
    const key = rowKey(op);
    const existing = key === null ? undefined : this.journal.find((e) => e.key === key);
    if (existing) {
      existing.label = label;
      existing.op = op;
      return;
    }
    this.journal.push({ label, key, op });
  }

  private async read<T>(label: string, op: Operation<T>, fallback: T): Promise<T> {
    if (this.status === 'ACTIVE') {
      try {
        return await this.withRetry(label, op);
      } catch (err) {
        this.degrade(err, label);
      }
    }
    return this.onSecondary(label, op, true).catch(() => fallback);
  }

  private async onSecondary<T>(
    label: string,
    op: Operation<T>,
    isRead: boolean,
  ): Promise<T> {
    await this.ensureSecondary();
    try {
      return await op(this.secondary);
    } catch (err) {
      this.stats.secondaryFailures += 1;
      this.lastError = errorMessage(err);
      this.logger.error(
        `${label} failed on ${this.secondary.name} as well; ${isRead ? 'returning empty result' : 'write kept only in memory and replay journal'}: ${this.lastError}`,
        errorStack(err),
      );
      throw err;
    }
  }

  private async withRetry<T>(label: string, op: Operation<T>): Promise<T> {
    const attempts = Math.max(1, this.settings.retryAttempts);
    let lastErr: unknown = null;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      this.stats.primaryAttempts += 1;
      try {
        const result = await op(this.primary);
        this.stats.consecutivePrimaryFailures = 0;
        return result;
      } catch (err) {
        lastErr = err;
        this.stats.primaryFailures += 1;
        this.stats.consecutivePrimaryFailures += 1;
        this.lastError = errorMessage(err);
        this.logger.warn(
          `${label} failed on ${this.primary.name} (attempt ${attempt}/${attempts}): ${this.lastError}`,
        );
        if (attempt < attempts) {
          await sleep(this.settings.retryBaseDelayMs * 2 ** (attempt - 1));
        }
      }
    }
    throw lastErr;
  }

  private async ensureSecondary(): Promise<void> {
    if (this.secondaryReady) return;
    try {
      await this.secondary.init();
      this.secondaryReady = true;
    } catch (err) {
      this.stats.secondaryFailures += 1;
      this.lastError = errorMessage(err);
      this.logger.error(
        `Secondary ${this.secondary.name} could not be initialized: ${this.lastError}`,
        errorStack(err),
      );
    }
  }

  private degrade(err: unknown, label: string): void {
    if (this.status === 'DEGRADED') return;
    this.status = 'DEGRADED';
    this.stats.failovers += 1;
    this.degradedSince = Date.now();
    this.logger.warn(
      `Primary ${this.primary.name} marked DEGRADED after ${label}: ${errorMessage(err)}. Routing to ${this.secondary.name}`,
    );
    this.startProbe();
    this.notify();
  }

  private async probe(): Promise<boolean> {
    this.stats.reconnectAttempts += 1;
    try {
      if (this.primaryReady) {
        await this.primary.ping();
      } else {
        await this.primary.init();
        this.primaryReady = true;
      }
      while (this.journal.length > 0) {
        const [entry] = this.journal;
        if (!entry) break;
        const { op } = entry;
        await applyOp(this.primary, op);
        // A write collapsed into this entry during the replay is applied next round.
        if (this.journal[0] === entry && entry.op === op) this.journal.shift();
      }
    } catch (err) {
      this.lastError = errorMessage(err);
      this.logger.warn(
        `Reconnect to ${this.primary.name} failed: ${this.lastError} (${this.journal.length} write(s) pending)`,
      );
      return false;
    }
    this.status = 'ACTIVE';
    this.stats.consecutivePrimaryFailures = 0;
    this.degradedSince = null;
    this.stopProbe();
    this.logger.log(`Primary ${this.primary.name} is ACTIVE again`);
    this.notify();
    return true;
  }

  private startProbe(): void {
    if (this.probeTimer || this.settings.probeIntervalMs <= 0) return;
    this.probeTimer = setInterval(() => {
      void this.reconnect();
    }, this.settings.probeIntervalMs);
    this.probeTimer.unref();
  }

  private stopProbe(): void {
    if (this.probeTimer) {
      clearInterval(this.probeTimer);
      this.probeTimer = null;
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.status);
      } catch (err) {
        this.logger.error(
          `Status listener failed: ${errorMessage(err)}`,
          errorStack(err),
        );
      }
    }
  }
}
