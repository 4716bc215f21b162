import { Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BridgeAuthGuard, type ActorRequest } from './bridge-auth.guard';

function contextFor(request: ActorRequest) {
  return { switchToHttp: () => ({ getRequest: () => request }) };
}

function guardWith(token: string): BridgeAuthGuard {
  return new BridgeAuthGuard(new ConfigService({ bridge: { token, ackTimeoutMs: 5_000 } }));
}

describe('BridgeAuthGuard', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('attaches the actor from headers', () => {
    const request: ActorRequest = {
      headers: {
        authorization: 'Bearer test-secret',
        'x-actor-id': 'u1',
        'x-actor-roles': ' bidders, mods ,',
        'x-actor-admin': 'true',
      },
    };

    expect(guardWith('test-secret').canActivate(contextFor(request) as never)).toBe(true);
    expect(request.actor).toEqual({ userId: 'u1', roleIds: ['bidders', 'mods'], isAdmin: true });
  });

  it('rejects a wrong bridge token', () => {
    const request: ActorRequest = {
      headers: { authorization: 'Bearer nope', 'x-actor-id': 'u1' },
    };
    expect(() => guardWith('test-secret').canActivate(contextFor(request) as never)).toThrow(
      new UnauthorizedException('Missing or invalid authorization header'),
    );
  });

  it('skips the token check when none is configured but still needs an actor', () => {
    const anonymous: ActorRequest = { headers: {} };
    expect(() => guardWith('').canActivate(contextFor(anonymous) as never)).toThrow(
      new UnauthorizedException('Missing x-actor-id header'),
    );

    const request: ActorRequest = { headers: { 'x-actor-id': 'u2' } };
    expect(guardWith('').canActivate(contextFor(request) as never)).toBe(true);
    expect(request.actor).toEqual({ userId: 'u2', roleIds: [], isAdmin: false });
  });
});
