import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { BridgeSettings } from '../config/configuration';
import { BRIDGE_SETTINGS, ChatBridgeGateway } from './chat-bridge.gateway';
import { MESSAGING_TRANSPORT } from './messaging.types';

@Module({
  providers: [
    {
      provide: BRIDGE_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): BridgeSettings =>
        config.getOrThrow<BridgeSettings>('bridge'),
    },
    ChatBridgeGateway,
    { provide: MESSAGING_TRANSPORT, useExisting: ChatBridgeGateway },
  ],
  exports: [MESSAGING_TRANSPORT, ChatBridgeGateway],
})
export class MessagingModule {}
