import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { errorMessage } from '../common/errors';
import type { BidThrottle } from './bid-throttle';

/**
 * Lua script for a fixed-window counter.
 * KEYS[1] = counter key, ARGV[1] = window in ms.
 * Returns the count after incrementing; the window starts on the first hit.
 */
const WINDOW_COUNTER_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
return count
`;

export type ThrottleDecision =
  | { allowed: true }
  | { allowed: false; reason: 'cooldown'; retryAfterMs: number }
  | { allowed: false; reason: 'rate_limit'; retryAfterMs: number };

/**
 * Per-user bid throttling shared across processes: a short cooldown between
 * bids and a cap on bids per minute. Redis being unreachable never blocks a
 * bid; the check fails open and logs.
 */
@Injectable()
export class RedisService implements BidThrottle, OnModuleDestroy {
  private readonly client: Redis;
  private readonly logger = new Logger(RedisService.name);

  constructor(config: ConfigService) {
    const url = config.get<string>('redis.url') ?? 'redis://localhost:6379';
    this.client = new Redis(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: (times) => Math.min(times * 200, 5_000),
    });
    this.client.on('error', (err) =>
      this.logger.error(`Redis connection error: ${err.message}`),
    );
    this.client.on('connect', () => this.logger.log('Connected to Redis'));
    this.client.connect().catch((err) =>
      this.logger.warn(`Redis unavailable, bid throttling disabled: ${errorMessage(err)}`),
    );
  }

  cooldownKey(guildId: string, userId: string): string {
    return `auction:${guildId}:bidder:${userId}:cooldown`;
  }

  rateKey(guildId: string, userId: string): string {
    return `auction:${guildId}:bidder:${userId}:per_minute`;
  }

  /** Claim the bidder's cooldown slot. False while an earlier claim is live. */
  async claimCooldown(guildId: string, userId: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.set(
      this.cooldownKey(guildId, userId),
      '1',
      'PX',
      ttlMs,
      'NX',
    );
    return result === 'OK';
  }

  async cooldownRemainingMs(guildId: string, userId: string): Promise<number> {
    const ttl = await this.client.pttl(this.cooldownKey(guildId, userId));
    return Math.max(0, ttl);
  }

  /** Count one bid in the current one-minute window; returns the new count. */
  async countBid(guildId: string, userId: string, windowMs = 60_000): Promise<number> {
    const result = await this.client.eval(
      WINDOW_COUNTER_SCRIPT,
      1,
      this.rateKey(guildId, userId),
      windowMs.toString(),
    );
    return Number(result);
  }

  async checkBidThrottle(
    guildId: string,
    userId: string,
    cooldownMs: number,
    maxPerMinute: number,
  ): Promise<ThrottleDecision> {
    try {
      if (cooldownMs > 0 && !(await this.claimCooldown(guildId, userId, cooldownMs))) {
        return {
          allowed: false,
          reason: 'cooldown',
          retryAfterMs: await this.cooldownRemainingMs(guildId, userId),
        };
      }
      if (maxPerMinute > 0) {
        const count = await this.countBid(guildId, userId);
        if (count > maxPerMinute) {
          const ttl = await this.client.pttl(this.rateKey(guildId, userId));
          return { allowed: false, reason: 'rate_limit', retryAfterMs: Math.max(0, ttl) };
        }
      }
      return { allowed: true };
    } catch (err) {
      this.logger.warn(`Bid throttle check skipped: ${errorMessage(err)}`);
      return { allowed: true };
    }
  }

  async onModuleDestroy() {
    if (this.client.status === 'end') return;
    await this.client.quit().catch(() => this.client.disconnect());
  }
}
