export const GUILD_CONFIG_PROVIDER = Symbol('GUILD_CONFIG_PROVIDER');

/** Guild-level settings managed outside the auction core. */
export interface GuildConfig {
  guildId: string;
  roleId: string | null;
  auctionChannelIds: string[];
  logChannelId: string | null;
  commissionPct: number;
  currencyName: string;
  secretCode: string | null;
}

/** Read-only access; the core never writes guild configuration. */
export interface GuildConfigProvider {
  getGuildConfig(guildId: string): Promise<GuildConfig>;
}
