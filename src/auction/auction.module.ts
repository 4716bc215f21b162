import { Module } from '@nestjs/common';
import { GuildConfigModule } from '../guild-config/guild-config.module';
import { MessagingModule } from '../messaging/messaging.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { AuctionController } from './auction.controller';
import { AuctionLogService } from './auction-log.service';
import { AuctionMonitor } from './auction-monitor.service';
import { AuctionRegistry } from './auction-registry';
import { AuctionService } from './auction.service';
import { PanelRenderer } from './panel-renderer.service';
import { PromoPicker } from './promo-picker';

@Module({
  imports: [PersistenceModule, MessagingModule, GuildConfigModule],
  controllers: [AuctionController],
  providers: [
    AuctionService,
    AuctionRegistry,
    AuctionMonitor,
    PanelRenderer,
    AuctionLogService,
    PromoPicker,
  ],
  exports: [AuctionService],
})
export class AuctionModule {}
