import type { ThrottleDecision } from './redis.service';

export const BID_THROTTLE = Symbol('BID_THROTTLE');

export interface BidThrottle {
  checkBidThrottle(
    guildId: string,
    userId: string,
    cooldownMs: number,
    maxPerMinute: number,
  ): Promise<ThrottleDecision>;
}
