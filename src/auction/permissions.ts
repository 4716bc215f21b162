import type { GuildConfig } from '../guild-config/guild-config.types';

/** Caller identity as resolved by the chat adapter. */
export interface Actor {
  userId: string;
  roleIds: string[];
  isAdmin: boolean;
}

export type CheckResult = { ok: true } | { ok: false; reason: string };

export type PermissionCheck = (actor: Actor, config: GuildConfig) => CheckResult;

const OK: CheckResult = { ok: true };

function deny(reason: string): CheckResult {
  return { ok: false, reason };
}

export const isAdmin: PermissionCheck = (actor) =>
  actor.isAdmin ? OK : deny('Administrator permission required');

/** Fails when the guild has no auction role configured. */
export const hasAuctionRole: PermissionCheck = (actor, config) => {
  if (config.roleId === null) return deny('No auction role is configured for this guild');
  return actor.roleIds.includes(config.roleId)
    ? OK
    : deny('You need the auction role to do this');
};

/** Fails when the guild has no secret configured. */
export function verifySecret(secret: string | undefined): PermissionCheck {
  return (_actor, config) => {
    if (config.secretCode === null) return deny('No secret code is configured');
    return secret !== undefined && secret === config.secretCode
      ? OK
      : deny('Invalid secret code');
  };
}

/** An empty channel list allows every channel. */
export function isAuctionChannel(channelId: string): PermissionCheck {
  return (_actor, config) =>
    config.auctionChannelIds.length === 0 ||
    config.auctionChannelIds.includes(channelId)
      ? OK
      : deny('Auctions cannot be run in this channel');
}

export function allOf(...checks: PermissionCheck[]): PermissionCheck {
  return (actor, config) => {
    for (const check of checks) {
      const result = check(actor, config);
      if (!result.ok) return result;
    }
    return OK;
  };
}

/** Passes on the first passing check; otherwise reports the first failure. */
export function anyOf(...checks: PermissionCheck[]): PermissionCheck {
  return (actor, config) => {
    let first: CheckResult | null = null;
    for (const check of checks) {
      const result = check(actor, config);
      if (result.ok) return OK;
      first ??= result;
    }
    return first ?? OK;
  };
}

/* ------------------------------------------------------------------ */
/*  COMMAND RULES                                                      */
/* ------------------------------------------------------------------ */

export function canOpenAuction(channelId: string, secret?: string): PermissionCheck {
  return allOf(
    isAuctionChannel(channelId),
    anyOf(hasAuctionRole, isAdmin, verifySecret(secret)),
  );
}

export function canManageAuction(secret?: string): PermissionCheck {
  return anyOf(isAdmin, verifySecret(secret));
}

export const canBid: PermissionCheck = hasAuctionRole;
