import { Module } from '@nestjs/common';
import { AuctionModule } from './auction/auction.module';
import { AuthModule } from './auth/auth.module';
import { ConfigModule } from './config/config.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [ConfigModule, RedisModule, AuthModule, AuctionModule],
})
export class AppModule {}
