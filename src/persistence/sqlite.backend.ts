import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Auction, Bid } from '../auction/engine';
import { StorageError, errorMessage } from '../common/errors';
import type {
  AuctionEndRecord,
  PersistenceBackend,
  StoredAuction,
} from './persistence.types';
import {
  AUCTION_COLUMNS,
  SCHEMA_STATEMENTS,
  auctionToColumns,
  rowToAuction,
  rowToBid,
  type AuctionColumnValues,
  type AuctionRow,
  type BidRow,
  type SettingRow,
} from './schema';

const UPSERT_AUCTION = `
  INSERT INTO auctions (${AUCTION_COLUMNS.join(', ')})
  VALUES (${AUCTION_COLUMNS.map((c) => `@${c}`).join(', ')})
  ON CONFLICT (id) DO UPDATE SET ${AUCTION_COLUMNS.filter((c) => c !== 'id')
    .map((c) => `${c} = excluded.${c}`)
    .join(', ')}
  WHERE auctions.status <> 'ENDED'`;

/**
 * Secondary embedded store. better-sqlite3 is synchronous; the async methods
 * keep the shape every backend shares.
 */
export class SqliteBackend implements PersistenceBackend {
  readonly name = 'sqlite';
  private db: Database.Database | null = null;

  constructor(private readonly path: string) {}

  async init(): Promise<void> {
    this.run(() => {
      if (this.path !== ':memory:') {
        mkdirSync(dirname(this.path), { recursive: true });
      }
      const db = new Database(this.path);
      db.pragma('journal_mode = WAL');
      for (const statement of SCHEMA_STATEMENTS) {
        db.exec(statement);
      }
      this.db = db;
    });
  }

  async ping(): Promise<void> {
    this.run(() => this.handle().prepare('SELECT 1').get());
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  async saveAuction(auction: Auction): Promise<void> {
    this.run(() =>
      this.handle()
        .prepare<AuctionColumnValues>(UPSERT_AUCTION)
        .run(auctionToColumns(auction)),
    );
  }

  async saveBid(bid: Bid): Promise<void> {
    this.run(() =>
      this.handle()
        .prepare(
          `INSERT INTO bids (id, auction_id, bidder_id, amount, sequence_no, created_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT DO NOTHING`,
        )
        .run(bid.id, bid.auctionId, bid.bidderId, bid.amount, bid.sequenceNo, bid.createdAt),
    );
  }

  async removeBid(auctionId: string, sequenceNo: number): Promise<void> {
    this.run(() =>
      this.handle()
        .prepare('DELETE FROM bids WHERE auction_id = ? AND sequence_no = ?')
        .run(auctionId, sequenceNo),
    );
  }

  async endAuction(record: AuctionEndRecord): Promise<void> {
    this.run(() =>
      this.handle()
        .prepare(
          `UPDATE auctions
           SET status = 'ENDED', final_price = ?, winner_id = ?, ended_at = ?,
               countdown_deadline = NULL
           WHERE id = ?`,
        )
        .run(record.finalPrice, record.winnerId, record.endedAt, record.auctionId),
    );
  }

  async getAuction(auctionId: string): Promise<StoredAuction | null> {
    const row = this.run(() =>
      this.handle()
        .prepare<[string], AuctionRow>('SELECT * FROM auctions WHERE id = ?')
        .get(auctionId),
    );
    return row ? rowToAuction(row) : null;
  }

  async getActiveAuction(guildId: string): Promise<StoredAuction | null> {
    const row = this.run(() =>
      this.handle()
        .prepare<[string], AuctionRow>(
          `SELECT * FROM auctions WHERE guild_id = ? AND status <> 'ENDED'
           ORDER BY started_at DESC LIMIT 1`,
        )
        .get(guildId),
    );
    return row ? rowToAuction(row) : null;
  }

  async getActiveAuctions(): Promise<StoredAuction[]> {
    const rows = this.run(() =>
      this.handle()
        .prepare<[], AuctionRow>(
          `SELECT * FROM auctions WHERE status <> 'ENDED' ORDER BY started_at ASC`,
        )
        .all(),
    );
    return rows.map(rowToAuction);
  }

  async getBids(auctionId: string): Promise<Bid[]> {
    const rows = this.run(() =>
      this.handle()
        .prepare<[string], BidRow>(
          'SELECT * FROM bids WHERE auction_id = ? ORDER BY sequence_no ASC',
        )
        .all(auctionId),
    );
    return rows.map(rowToBid);
  }

  async getRecentAuctions(guildId: string, limit: number): Promise<StoredAuction[]> {
    const rows = this.run(() =>
      this.handle()
        .prepare<[string, number], AuctionRow>(
          'SELECT * FROM auctions WHERE guild_id = ? ORDER BY started_at DESC LIMIT ?',
        )
        .all(guildId, limit),
    );
    return rows.map(rowToAuction);
  }

  async getSetting(guildId: string, key: string): Promise<string | null> {
    const row = this.run(() =>
      this.handle()
        .prepare<[string, string], SettingRow>(
          'SELECT value FROM settings WHERE guild_id = ? AND key = ?',
        )
        .get(guildId, key),
    );
    return row?.value ?? null;
  }

  async setSetting(guildId: string, key: string, value: string, now: number): Promise<void> {
    this.run(() =>
      this.handle()
        .prepare(
          `INSERT INTO settings (guild_id, key, value, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT (guild_id, key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
        )
        .run(guildId, key, value, now),
    );
  }

  private handle(): Database.Database {
    if (!this.db) throw new StorageError('sqlite: database is not open');
    return this.db;
  }

  private run<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`sqlite: ${errorMessage(err)}`, { cause: err });
    }
  }
}
