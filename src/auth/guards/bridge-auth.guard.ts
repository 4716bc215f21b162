import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Actor } from '../../auction/permissions';
import type { BridgeSettings } from '../../config/configuration';

export interface ActorRequest {
  headers: Record<string, string | string[] | undefined>;
  actor?: Actor;
}

function header(request: ActorRequest, name: string): string | null {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() ? first.trim() : null;
}

/**
 * Accepts commands relayed by a trusted chat adapter. The adapter presents
 * the bridge token as a Bearer token and states who issued the command in
 * `x-actor-id`, `x-actor-roles` (comma-separated) and `x-actor-admin`.
 */
@Injectable()
export class BridgeAuthGuard implements CanActivate {
  private readonly logger = new Logger(BridgeAuthGuard.name);
  private readonly token: string;

  constructor(config: ConfigService) {
    this.token = config.get<BridgeSettings>('bridge')?.token ?? '';
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<ActorRequest>();

    if (this.token && this.extractToken(request) !== this.token) {
      this.logger.warn('Command rejected: missing or invalid bridge token');
      throw new UnauthorizedException('Missing or invalid authorization header');
    }

    const userId = header(request, 'x-actor-id');
    if (!userId) {
      throw new UnauthorizedException('Missing x-actor-id header');
    }
    request.actor = {
      userId,
      roleIds: (header(request, 'x-actor-roles') ?? '')
        .split(',')
        .map((id) => id.trim())
        .filter(Boolean),
      isAdmin: header(request, 'x-actor-admin') === 'true',
    };
    return true;
  }

  private extractToken(request: ActorRequest): string | null {
    const auth = header(request, 'authorization');
    if (!auth || !auth.startsWith('Bearer ')) return null;
    return auth.slice(7).trim() || null;
  }
}
