import { Logger } from '@nestjs/common';
import { Pool, type QueryResultRow } from 'pg';
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
  type AuctionRow,
  type BidRow,
  type SettingRow,
} from './schema';

const UPSERT_AUCTION = `
  INSERT INTO auctions (${AUCTION_COLUMNS.join(', ')})
  VALUES (${AUCTION_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})
  ON CONFLICT (id) DO UPDATE SET ${AUCTION_COLUMNS.filter((c) => c !== 'id')
    .map((c) => `${c} = EXCLUDED.${c}`)
    .join(', ')}
  WHERE auctions.status <> 'ENDED'`;

/**
 * Primary networked store. BIGINT columns come back as strings and are
 * converted in {@link rowToAuction}.
 */
export class PostgresBackend implements PersistenceBackend {
  readonly name = 'postgres';
  private readonly logger = new Logger(PostgresBackend.name);
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 10,
      connectionTimeoutMillis: 5_000,
      idleTimeoutMillis: 30_000,
    });
    this.pool.on('error', (err) =>
      this.logger.error(`Idle Postgres client error: ${err.message}`, err.stack),
    );
  }

  async init(): Promise<void> {
    for (const statement of SCHEMA_STATEMENTS) {
      await this.query(statement);
    }
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async saveAuction(auction: Auction): Promise<void> {
    const columns = auctionToColumns(auction);
    await this.query(
      UPSERT_AUCTION,
      AUCTION_COLUMNS.map((c) => columns[c]),
    );
  }

  async saveBid(bid: Bid): Promise<void> {
    await this.query(
      `INSERT INTO bids (id, auction_id, bidder_id, amount, sequence_no, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT DO NOTHING`,
      [bid.id, bid.auctionId, bid.bidderId, bid.amount, bid.sequenceNo, bid.createdAt],
    );
  }

  async removeBid(auctionId: string, sequenceNo: number): Promise<void> {
    await this.query(
      'DELETE FROM bids WHERE auction_id = $1 AND sequence_no = $2',
      [auctionId, sequenceNo],
    );
  }

  async endAuction(record: AuctionEndRecord): Promise<void> {
    await this.query(
      `UPDATE auctions
       SET status = 'ENDED', final_price = $2, winner_id = $3, ended_at = $4,
           countdown_deadline = NULL
       WHERE id = $1`,
      [record.auctionId, record.finalPrice, record.winnerId, record.endedAt],
    );
  }

  async getAuction(auctionId: string): Promise<StoredAuction | null> {
    const rows = await this.query<AuctionRow>(
      'SELECT * FROM auctions WHERE id = $1',
      [auctionId],
    );
    return rows[0] ? rowToAuction(rows[0]) : null;
  }

  async getActiveAuction(guildId: string): Promise<StoredAuction | null> {
    const rows = await this.query<AuctionRow>(
      `SELECT * FROM auctions WHERE guild_id = $1 AND status <> 'ENDED'
       ORDER BY started_at DESC LIMIT 1`,
      [guildId],
    );
    return rows[0] ? rowToAuction(rows[0]) : null;
  }

  async getActiveAuctions(): Promise<StoredAuction[]> {
    const rows = await this.query<AuctionRow>(
      `SELECT * FROM auctions WHERE status <> 'ENDED' ORDER BY started_at ASC`,
    );
    return rows.map(rowToAuction);
  }

  async getBids(auctionId: string): Promise<Bid[]> {
    const rows = await this.query<BidRow>(
      'SELECT * FROM bids WHERE auction_id = $1 ORDER BY sequence_no ASC',
      [auctionId],
    );
    return rows.map(rowToBid);
  }

  async getRecentAuctions(guildId: string, limit: number): Promise<StoredAuction[]> {
    const rows = await this.query<AuctionRow>(
      'SELECT * FROM auctions WHERE guild_id = $1 ORDER BY started_at DESC LIMIT $2',
      [guildId, limit],
    );
    return rows.map(rowToAuction);
  }

  async getSetting(guildId: string, key: string): Promise<string | null> {
    const rows = await this.query<SettingRow>(
      'SELECT value FROM settings WHERE guild_id = $1 AND key = $2',
      [guildId, key],
    );
    return rows[0]?.value ?? null;
  }

  async setSetting(guildId: string, key: string, value: string, now: number): Promise<void> {
    await this.query(
      `INSERT INTO settings (guild_id, key, value, updated_at) VALUES ($1, $2, $3, $4)
       ON CONFLICT (guild_id, key) DO UPDATE SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at`,
      [guildId, key, value, now],
    );
  }

  private async query<R extends QueryResultRow>(
    text: string,
    values: Array<string | number | null> = [],
  ): Promise<R[]> {
    try {
      const result = await this.pool.query<R>(text, values);
      return result.rows;
    } catch (err) {
      throw new StorageError(`postgres: ${errorMessage(err)}`, { cause: err });
    }
  }
}
