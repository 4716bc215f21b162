import { Global, Module } from '@nestjs/common';
import { BID_THROTTLE } from './bid-throttle';
import { RedisService } from './redis.service';

@Global()
@Module({
  providers: [RedisService, { provide: BID_THROTTLE, useExisting: RedisService }],
  exports: [RedisService, BID_THROTTLE],
})
export class RedisModule {}
