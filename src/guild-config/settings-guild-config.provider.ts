import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { AUCTION_SETTINGS } from '../config/config.module';
import type { AuctionSettings } from '../config/configuration';
import { PersistenceGateway } from '../persistence/persistence.gateway';
import type { GuildConfig, GuildConfigProvider } from './guild-config.types';

export const GUILD_SETTING_KEYS = {
  roleId: 'role_id',
  auctionChannelIds: 'auction_channel_ids',
  logChannelId: 'log_channel_id',
  commissionPct: 'commission_pct',
  currencyName: 'currency_name',
  secretCode: 'secret_code',
} as const;

type SettingKey = (typeof GUILD_SETTING_KEYS)[keyof typeof GUILD_SETTING_KEYS];

interface KnownConfig {
  config: GuildConfig;
  values: Map<SettingKey, string>;
  loadedAt: number;
}

function blankToNull(value: string | null | undefined): string | null {
  return value === null || value === undefined || value.trim() === ''
    ? null
    : value.trim();
}

function copyConfig(config: GuildConfig): GuildConfig {
  return { ...config, auctionChannelIds: [...config.auctionChannelIds] };
}

/**
 * GuildConfig from the guild-scoped `settings` table, with configured
 * defaults for commission and currency.
 *
 * The last config read per guild is kept in memory. It is served for
 * `guildConfigCacheMs` while storage is ACTIVE and for as long as storage is
 * DEGRADED, and its rows are copied to the secondary on failover.
 */
@Injectable()
export class SettingsGuildConfigProvider
  implements GuildConfigProvider, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(SettingsGuildConfigProvider.name);
  private readonly lastKnown = new Map<string, KnownConfig>();
  private unsubscribe: (() => void) | null = null;
  private mirroring: Promise<void> = Promise.resolve();

  constructor(
    private readonly persistence: PersistenceGateway,
    @Inject(AUCTION_SETTINGS) private readonly settings: AuctionSettings,
  ) {}

  onModuleInit(): void {
    this.unsubscribe = this.persistence.onStatusChange((status) => {
      if (status === 'DEGRADED') this.mirroring = this.mirrorKnown();
    });
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  async getGuildConfig(guildId: string): Promise<GuildConfig> {
    const known = this.lastKnown.get(guildId);
    if (known && (this.degraded() || this.fresh(known))) {
      return copyConfig(known.config);
    }

    const values = await this.readValues(guildId);
    // The read may itself have failed over; keep serving what was last seen.
    if (known && this.degraded()) return copyConfig(known.config);

    const config = this.toConfig(guildId, values);
    this.lastKnown.set(guildId, { config, values, loadedAt: Date.now() });
    return copyConfig(config);
  }

  /** Settles once the copy started by the latest failover has finished. */
  whenMirrored(): Promise<void> {
    return this.mirroring;
  }

  private degraded(): boolean {
    return this.persistence.getConnectionStatus().status === 'DEGRADED';
  }

  private fresh(known: KnownConfig): boolean {
    return Date.now() - known.loadedAt < this.settings.guildConfigCacheMs;
  }

  private async readValues(guildId: string): Promise<Map<SettingKey, string>> {
    const keys = Object.values(GUILD_SETTING_KEYS);
    const read = await Promise.all(
      keys.map((key) => this.persistence.getSetting(guildId, key)),
    );
    const values = new Map<SettingKey, string>();
    keys.forEach((key, i) => {
      const value = read[i];
      if (value !== null && value !== undefined) values.set(key, value);
    });
    return values;
  }

  private toConfig(guildId: string, values: Map<SettingKey, string>): GuildConfig {
    const commission = blankToNull(values.get(GUILD_SETTING_KEYS.commissionPct));
    const commissionPct = Number(commission);
    return {
      guildId,
      roleId: blankToNull(values.get(GUILD_SETTING_KEYS.roleId)),
      auctionChannelIds: (values.get(GUILD_SETTING_KEYS.auctionChannelIds) ?? '')
        .split(',')
        .map((id) => id.trim())
        .filter(Boolean),
      logChannelId: blankToNull(values.get(GUILD_SETTING_KEYS.logChannelId)),
      commissionPct:
        commission !== null && Number.isFinite(commissionPct) && commissionPct >= 0
          ? commissionPct
          : this.settings.defaultCommissionPct,
      currencyName:
        blankToNull(values.get(GUILD_SETTING_KEYS.currencyName)) ??
        this.settings.defaultCurrency,
      secretCode: blankToNull(values.get(GUILD_SETTING_KEYS.secretCode)),
    };
  }

  private async mirrorKnown(): Promise<void> {
    for (const [guildId, known] of this.lastKnown) {
      if (known.values.size === 0) continue;
      const copied = await this.persistence.mirrorSettings(guildId, known.values);
      if (!copied) {
        this.logger.warn(`Settings for guild ${guildId} could not be copied to the secondary`);
      }
    }
  }
}
