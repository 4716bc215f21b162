import type { Auction, AuctionOutcome, Bid } from '../auction/engine';

export const PRIMARY_BACKEND = Symbol('PRIMARY_BACKEND');
export const SECONDARY_BACKEND = Symbol('SECONDARY_BACKEND');
export const PERSISTENCE_SETTINGS = Symbol('PERSISTENCE_SETTINGS');

/** Auction row as stored, including the outcome columns written at finalize. */
export interface StoredAuction extends Auction {
  finalPrice: number | null;
  winnerId: string | null;
}

export type AuctionEndRecord = Pick<
  AuctionOutcome,
  'auctionId' | 'winnerId' | 'finalPrice' | 'endedAt'
>;

/**
 * One storage engine. Writes are idempotent upserts so a journal of them can
 * be replayed. Every failure surfaces as a StorageError.
 */
export interface PersistenceBackend {
  readonly name: string;
  init(): Promise<void>;
  ping(): Promise<void>;
  close(): Promise<void>;

  saveAuction(auction: Auction): Promise<void>;
  saveBid(bid: Bid): Promise<void>;
  removeBid(auctionId: string, sequenceNo: number): Promise<void>;
  endAuction(record: AuctionEndRecord): Promise<void>;

  getAuction(auctionId: string): Promise<StoredAuction | null>;
  getActiveAuction(guildId: string): Promise<StoredAuction | null>;
  getActiveAuctions(): Promise<StoredAuction[]>;
  getBids(auctionId: string): Promise<Bid[]>;
  getRecentAuctions(guildId: string, limit: number): Promise<StoredAuction[]>;

  getSetting(guildId: string, key: string): Promise<string | null>;
  setSetting(guildId: string, key: string, value: string, now: number): Promise<void>;
}

export type BackendStatus = 'ACTIVE' | 'DEGRADED';

export interface ConnectionStatus {
  status: BackendStatus;
  activeBackend: string;
  primaryAttempts: number;
  primaryFailures: number;
  consecutivePrimaryFailures: number;
  secondaryFailures: number;
  failovers: number;
  reconnectAttempts: number;
  pendingReplay: number;
  degradedSince: number | null;
  lastError: string | null;
}
