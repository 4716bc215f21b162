import { Global, Module } from '@nestjs/common';
import { BridgeAuthGuard } from './guards/bridge-auth.guard';

@Global()
@Module({
  providers: [BridgeAuthGuard],
  exports: [BridgeAuthGuard],
})
export class AuthModule {}
