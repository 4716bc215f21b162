import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { GUILD_CONFIG_PROVIDER } from './guild-config.types';
import { SettingsGuildConfigProvider } from './settings-guild-config.provider';

@Module({
  imports: [PersistenceModule],
  providers: [
    SettingsGuildConfigProvider,
    { provide: GUILD_CONFIG_PROVIDER, useExisting: SettingsGuildConfigProvider },
  ],
  exports: [GUILD_CONFIG_PROVIDER],
})
export class GuildConfigModule {}
