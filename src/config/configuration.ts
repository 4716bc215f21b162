export type PromoPolicy = 'random' | 'round-robin';

export interface AuctionSettings {
  inactivityThresholdSec: number;
  countdownSec: number;
  monitorTickMs: number;
  panelUpdateDelayMs: number;
  cooldownSec: number;
  maxBidsPerMinute: number;
  minBidAmount: number;
  maxBidAmount: number;
  minDurationMin: number;
  maxDurationMin: number;
  defaultDurationMin: number;
  defaultStartBid: number;
  defaultMinIncrement: number;
  defaultCommissionPct: number;
  defaultCurrency: string;
  bidHistoryDisplay: number;
  /** How long a guild's settings are served from memory before a re-read. */
  guildConfigCacheMs: number;
  promo: {
    enabled: boolean;
    policy: PromoPolicy;
    templates: string[];
  };
}

export interface PersistenceSettings {
  databaseUrl: string;
  sqlitePath: string;
  retryAttempts: number;
  retryBaseDelayMs: number;
  probeIntervalMs: number;
}

export interface BridgeSettings {
  ackTimeoutMs: number;
  /** Empty disables the handshake check. */
  token: string;
}

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function promoPolicy(raw: string | undefined): PromoPolicy {
  return raw === 'round-robin' ? 'round-robin' : 'random';
}

// `{leader}` is left for the chat adapter to turn into a mention.
const DEFAULT_PROMO_TEMPLATES = [
  'Going once... {leader} leads with {amount}. Who breaks it?',
  '{leader} raised the price to {amount}. Time for the next champion!',
  'Still open: {leader} is on top with {amount}. Show us what you have.',
  'Challenge update: {leader} holds {amount}. Can you beat it?',
  'Last call! {leader} reached {amount}. Anyone brave enough?',
  '{leader} came in strong with {amount}. Who is next?',
  '{leader} leads at {amount}. Take the crown!',
];

export default () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  redis: {
    url: process.env.REDIS_URL ?? 'redis://localhost:6379',
  },
  persistence: {
    databaseUrl:
      process.env.DATABASE_URL ?? 'postgresql://localhost:5432/auction',
    sqlitePath: process.env.SQLITE_PATH ?? './data/auction.sqlite',
    retryAttempts: intEnv('DB_RETRY_ATTEMPTS', 3),
    retryBaseDelayMs: intEnv('DB_RETRY_DELAY_MS', 200),
    probeIntervalMs: intEnv('DB_PROBE_INTERVAL_MS', 60_000),
  } satisfies PersistenceSettings,
  bridge: {
    ackTimeoutMs: intEnv('BRIDGE_ACK_TIMEOUT_MS', 5_000),
    token: process.env.BRIDGE_TOKEN ?? '',
  } satisfies BridgeSettings,
  auction: {
    inactivityThresholdSec: intEnv('INACTIVITY_THRESHOLD_SEC', 30),
    countdownSec: intEnv('COUNTDOWN_SEC', 3),
    monitorTickMs: intEnv('MONITOR_TICK_MS', 1_000),
    panelUpdateDelayMs: intEnv('PANEL_UPDATE_DELAY_MS', 500),
    cooldownSec: intEnv('BID_COOLDOWN_SEC', 2),
    maxBidsPerMinute: intEnv('MAX_BIDS_PER_MINUTE', 30),
    minBidAmount: 1_000,
    maxBidAmount: 1_000_000_000_000,
    minDurationMin: 1,
    maxDurationMin: 1_440,
    defaultDurationMin: 5,
    defaultStartBid: 250_000,
    defaultMinIncrement: 50_000,
    defaultCommissionPct: intEnv('DEFAULT_COMMISSION', 20),
    defaultCurrency: process.env.DEFAULT_CURRENCY ?? 'Credits',
    bidHistoryDisplay: 10,
    guildConfigCacheMs: intEnv('GUILD_CONFIG_CACHE_MS', 30_000),
    promo: {
      enabled: process.env.PROMO_ENABLED !== 'false',
      policy: promoPolicy(process.env.PROMO_POLICY),
      templates: DEFAULT_PROMO_TEMPLATES,
    },
  } satisfies AuctionSettings,
});
