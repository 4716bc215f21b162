import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import configuration, { type AuctionSettings } from './configuration';

export const AUCTION_SETTINGS = Symbol('AUCTION_SETTINGS');

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
  ],
  providers: [
    {
      provide: AUCTION_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): AuctionSettings =>
        config.getOrThrow<AuctionSettings>('auction'),
    },
  ],
  exports: [AUCTION_SETTINGS],
})
export class ConfigModule {}
