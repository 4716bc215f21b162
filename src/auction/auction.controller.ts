import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { CurrentActor } from '../auth/decorators/actor.decorator';
import { BridgeAuthGuard } from '../auth/guards/bridge-auth.guard';
import type { Actor } from './permissions';
import { AuctionService } from './auction.service';
import type { CommandResult, FailureData } from './auction.types';

const STATUS_BY_CODE: Record<FailureData['code'], HttpStatus> = {
  VALIDATION: HttpStatus.BAD_REQUEST,
  BID_PARSE: HttpStatus.BAD_REQUEST,
  BID_VALIDATION: HttpStatus.BAD_REQUEST,
  PERMISSION: HttpStatus.FORBIDDEN,
  CONCURRENCY_CONFLICT: HttpStatus.CONFLICT,
  CONFLICT: HttpStatus.CONFLICT,
  STATE: HttpStatus.CONFLICT,
  THROTTLED: HttpStatus.TOO_MANY_REQUESTS,
  TRANSPORT: HttpStatus.BAD_GATEWAY,
  TRANSPORT_PERMISSION: HttpStatus.BAD_GATEWAY,
  STORAGE: HttpStatus.SERVICE_UNAVAILABLE,
  INTERNAL: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** Successful results pass through; failures become HTTP errors with the same body. */
function unwrap<T>(result: CommandResult<T>): CommandResult<T> {
  if (!result.success) {
    throw new HttpException(result, STATUS_BY_CODE[result.data.code]);
  }
  return result;
}

function requireAdmin(actor: Actor): void {
  if (!actor.isAdmin) {
    throw new HttpException(
      {
        success: false,
        message: 'Administrator permission required',
        data: { code: 'PERMISSION' },
      },
      HttpStatus.FORBIDDEN,
    );
  }
}

function amountField(value: unknown): string | number | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

function stringField(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

@Controller('guilds/:guildId/auction')
@UseGuards(BridgeAuthGuard)
export class AuctionController {
  constructor(private readonly auctionService: AuctionService) {}

  @Post()
  async open(
    @Param('guildId') guildId: string,
    @CurrentActor() actor: Actor,
    @Body()
    body: {
      channelId?: unknown;
      startBid?: unknown;
      minIncrement?: unknown;
      durationMinutes?: unknown;
      secret?: unknown;
    },
  ) {
    return unwrap(
      await this.auctionService.open(guildId, actor, {
        channelId: stringField(body.channelId) ?? '',
        startBid: amountField(body.startBid),
        minIncrement: amountField(body.minIncrement),
        durationMinutes:
          body.durationMinutes === undefined ? undefined : Number(body.durationMinutes),
        secret: stringField(body.secret),
      }),
    );
  }

  @Post('bids')
  async placeBid(
    @Param('guildId') guildId: string,
    @CurrentActor() actor: Actor,
    @Body() body: { amount?: unknown; increment?: unknown },
  ) {
    return unwrap(
      await this.auctionService.placeBid(guildId, actor, {
        amount: amountField(body.amount),
        increment: amountField(body.increment),
      }),
    );
  }

  @Post('undo')
  @HttpCode(HttpStatus.OK)
  async undo(
    @Param('guildId') guildId: string,
    @CurrentActor() actor: Actor,
    @Body('secret') secret?: unknown,
  ) {
    return unwrap(
      await this.auctionService.undoLast(guildId, actor, { secret: stringField(secret) }),
    );
  }

  @Post('end')
  @HttpCode(HttpStatus.OK)
  async end(
    @Param('guildId') guildId: string,
    @CurrentActor() actor: Actor,
    @Body('secret') secret?: unknown,
  ) {
    return unwrap(
      await this.auctionService.end(guildId, actor, { secret: stringField(secret) }),
    );
  }

  @Get('recent')
  async recent(
    @Param('guildId') guildId: string,
    @Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number,
  ) {
    return unwrap(await this.auctionService.recentAuctions(guildId, limit));
  }

  @Get('debug/status')
  status(@Param('guildId') guildId: string, @CurrentActor() actor: Actor) {
    requireAdmin(actor);
    return unwrap(this.auctionService.debugStatus(guildId));
  }

  @Get('debug/auction')
  auction(@Param('guildId') guildId: string, @CurrentActor() actor: Actor) {
    requireAdmin(actor);
    return unwrap(this.auctionService.debugAuction(guildId));
  }

  @Post('storage/reconnect')
  @HttpCode(HttpStatus.OK)
  async reconnect(@CurrentActor() actor: Actor) {
    requireAdmin(actor);
    return unwrap(await this.auctionService.reconnectStorage());
  }
}
