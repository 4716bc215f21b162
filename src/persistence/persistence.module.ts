import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PersistenceSettings } from '../config/configuration';
import { PersistenceGateway } from './persistence.gateway';
import {
  PERSISTENCE_SETTINGS,
  PRIMARY_BACKEND,
  SECONDARY_BACKEND,
} from './persistence.types';
import { PostgresBackend } from './postgres.backend';
import { SqliteBackend } from './sqlite.backend';

@Module({
  providers: [
    {
      provide: PERSISTENCE_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): PersistenceSettings =>
        config.getOrThrow<PersistenceSettings>('persistence'),
    },
    {
      provide: PRIMARY_BACKEND,
      inject: [PERSISTENCE_SETTINGS],
      useFactory: (settings: PersistenceSettings) =>
        new PostgresBackend(settings.databaseUrl),
    },
    {
      provide: SECONDARY_BACKEND,
      inject: [PERSISTENCE_SETTINGS],
      useFactory: (settings: PersistenceSettings) =>
        new SqliteBackend(settings.sqlitePath),
    },
    PersistenceGateway,
  ],
  exports: [PersistenceGateway],
})
export class PersistenceModule {}
