import type { Auction, Bid } from '../auction/engine';
import type { StoredAuction } from './persistence.types';

/** DDL accepted by both PostgreSQL and SQLite. */
export const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS auctions (
    id TEXT PRIMARY KEY,
    guild_id TEXT NOT NULL,
    channel_id TEXT NOT NULL,
    status TEXT NOT NULL,
    start_bid BIGINT NOT NULL,
    min_increment BIGINT NOT NULL,
    current_bid BIGINT,
    current_bidder_id TEXT,
    commission_pct DOUBLE PRECISION NOT NULL,
    currency_name TEXT NOT NULL,
    started_by TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL,
    started_at BIGINT NOT NULL,
    ends_at BIGINT NOT NULL,
    countdown_deadline BIGINT,
    last_activity_at BIGINT NOT NULL,
    ended_at BIGINT,
    final_price BIGINT,
    winner_id TEXT,
    panel_channel_id TEXT,
    panel_message_id TEXT
  )`,
  `CREATE INDEX IF NOT EXISTS auctions_guild_status_idx ON auctions (guild_id, status)`,
  `CREATE TABLE IF NOT EXISTS bids (
    id TEXT PRIMARY KEY,
    auction_id TEXT NOT NULL,
    bidder_id TEXT NOT NULL,
    amount BIGINT NOT NULL,
    sequence_no INTEGER NOT NULL,
    created_at BIGINT NOT NULL,
    UNIQUE (auction_id, sequence_no)
  )`,
  `CREATE TABLE IF NOT EXISTS settings (
    guild_id TEXT NOT NULL,
    key TEXT NOT NULL,
    value TEXT NOT NULL,
    updated_at BIGINT NOT NULL,
    PRIMARY KEY (guild_id, key)
  )`,
];

export const AUCTION_COLUMNS = [
  'id',
  'guild_id',
  'channel_id',
  'status',
  'start_bid',
  'min_increment',
  'current_bid',
  'current_bidder_id',
  'commission_pct',
  'currency_name',
  'started_by',
  'duration_minutes',
  'started_at',
  'ends_at',
  'countdown_deadline',
  'last_activity_at',
  'ended_at',
  'panel_channel_id',
  'panel_message_id',
] as const;

// pg hands BIGINT back as a string; SQLite as a number.
type DbNumber = number | string | bigint;

// Aliases rather than interfaces: pg's row constraint needs an index signature.
export type AuctionRow = {
  id: string;
  guild_id: string;
  channel_id: string;
  status: string;
  start_bid: DbNumber;
  min_increment: DbNumber;
  current_bid: DbNumber | null;
  current_bidder_id: string | null;
  commission_pct: DbNumber;
  currency_name: string;
  started_by: string;
  duration_minutes: DbNumber;
  started_at: DbNumber;
  ends_at: DbNumber;
  countdown_deadline: DbNumber | null;
  last_activity_at: DbNumber;
  ended_at: DbNumber | null;
  final_price: DbNumber | null;
  winner_id: string | null;
  panel_channel_id: string | null;
  panel_message_id: string | null;
};

export type BidRow = {
  id: string;
  auction_id: string;
  bidder_id: string;
  amount: DbNumber;
  sequence_no: DbNumber;
  created_at: DbNumber;
};

export type SettingRow = {
  value: string;
};

export type AuctionColumnValues = Record<
  (typeof AUCTION_COLUMNS)[number],
  string | number | null
>;

function num(value: DbNumber): number {
  return Number(value);
}

function numOrNull(value: DbNumber | null): number | null {
  return value === null ? null : Number(value);
}

function status(value: string): Auction['status'] {
  if (value === 'OPEN' || value === 'COUNTDOWN' || value === 'ENDED') {
    return value;
  }
  throw new Error(`Unknown auction status "${value}"`);
}

export function auctionToColumns(auction: Auction): AuctionColumnValues {
  return {
    id: auction.id,
    guild_id: auction.guildId,
    channel_id: auction.channelId,
    status: auction.status,
    start_bid: auction.startBid,
    min_increment: auction.minIncrement,
    current_bid: auction.currentBid,
    current_bidder_id: auction.currentBidderId,
    commission_pct: auction.commissionPct,
    currency_name: auction.currencyName,
    started_by: auction.startedBy,
    duration_minutes: auction.durationMinutes,
    started_at: auction.startedAt,
    ends_at: auction.endsAt,
    countdown_deadline: auction.countdownDeadline,
    last_activity_at: auction.lastActivityAt,
    ended_at: auction.endedAt,
    panel_channel_id: auction.panelReference?.channelId ?? null,
    panel_message_id: auction.panelReference?.messageId ?? null,
  };
}

export function rowToAuction(row: AuctionRow): StoredAuction {
  return {
    id: row.id,
    guildId: row.guild_id,
    channelId: row.channel_id,
    status: status(row.status),
    startBid: num(row.start_bid),
    minIncrement: num(row.min_increment),
    currentBid: numOrNull(row.current_bid),
    currentBidderId: row.current_bidder_id,
    commissionPct: num(row.commission_pct),
    currencyName: row.currency_name,
    startedBy: row.started_by,
    durationMinutes: num(row.duration_minutes),
    startedAt: num(row.started_at),
    endsAt: num(row.ends_at),
    countdownDeadline: numOrNull(row.countdown_deadline),
    lastActivityAt: num(row.last_activity_at),
    endedAt: numOrNull(row.ended_at),
    panelReference:
      row.panel_channel_id !== null && row.panel_message_id !== null
        ? { channelId: row.panel_channel_id, messageId: row.panel_message_id }
        : null,
    finalPrice: numOrNull(row.final_price),
    winnerId: row.winner_id,
  };
}

export function rowToBid(row: BidRow): Bid {
  return {
    id: row.id,
    auctionId: row.auction_id,
    bidderId: row.bidder_id,
    amount: num(row.amount),
    sequenceNo: num(row.sequence_no),
    createdAt: num(row.created_at),
  };
}
