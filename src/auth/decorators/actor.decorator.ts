import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { Actor } from '../../auction/permissions';
import type { ActorRequest } from '../guards/bridge-auth.guard';

export const CurrentActor = createParamDecorator(
  (_: unknown, ctx: ExecutionContext): Actor => {
    const { actor } = ctx.switchToHttp().getRequest<ActorRequest>();
    if (!actor) throw new UnauthorizedException('No actor on request');
    return actor;
  },
);
