import { Logger } from '@nestjs/common';
import { AuctionEngine, type AuctionSnapshot } from '../auction/engine';
import { StorageError } from '../common/errors';
import { InMemoryBackend } from '../testing/in-memory.backend';
import { inMemoryPersistence } from '../testing/persistence.fixture';
import { PersistenceGateway } from './persistence.gateway';
import type { BackendStatus } from './persistence.types';

const limits = { minBidAmount: 1_000, maxBidAmount: 1_000_000_000_000 };

function liveAuction(): { engine: AuctionEngine; snapshot: () => AuctionSnapshot } {
  const engine = new AuctionEngine({
    id: 'a1',
    guildId: 'g1',
    channelId: 'c1',
    startedBy: 'admin-1',
    startBid: 250_000,
    minIncrement: 50_000,
    durationMinutes: 5,
    commissionPct: 20,
    currencyName: 'Credits',
    now: 1_000,
  });
  return { engine, snapshot: () => engine.getState() };
}

describe('PersistenceGateway', () => {
  let primary: InMemoryBackend;
  let secondary: InMemoryBackend;
  let gateway: PersistenceGateway;
  let statuses: BackendStatus[];

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    ({ primary, secondary, gateway } = inMemoryPersistence());
    statuses = [];
    gateway.onStatusChange((status) => statuses.push(status));
    await gateway.onModuleInit();
  });

  afterEach(async () => {
    await gateway.onModuleDestroy();
    jest.restoreAllMocks();
  });

  it('writes to and reads from the primary while ACTIVE', async () => {
    const { snapshot } = liveAuction();
    await expect(gateway.createAuction(snapshot().auction)).resolves.toBe(true);

    expect(primary.auctions.get('a1')?.status).toBe('OPEN');
    expect(secondary.auctions.size).toBe(0);
    await expect(gateway.getActiveAuction('g1')).resolves.toEqual(
      expect.objectContaining({ id: 'a1', finalPrice: null, winnerId: null }),
    );
  });

  it('fails over after the retry budget and serves from the secondary', async () => {
    const { snapshot } = liveAuction();
    primary.failing = true;

    await expect(gateway.createAuction(snapshot().auction)).resolves.toBe(true);

    expect(primary.calls.filter((c) => c === 'saveAuction')).toHaveLength(3);
    expect(secondary.auctions.has('a1')).toBe(true);
    expect(statuses).toEqual(['DEGRADED']);
    expect(gateway.getConnectionStatus()).toEqual(
      expect.objectContaining({
        status: 'DEGRADED',
        activeBackend: 'sqlite',
        primaryFailures: 3,
        consecutivePrimaryFailures: 3,
        failovers: 1,
        pendingReplay: 1,
        lastError: 'postgres: connection refused',
      }),
    );

    const primaryCalls = primary.calls.length;
    await expect(gateway.getActiveAuctions()).resolves.toHaveLength(1);
    expect(primary.calls).toHaveLength(primaryCalls);
  });

  it('replays degraded writes to the primary on reconnect', async () => {
    const { engine, snapshot } = liveAuction();
    primary.failing = true;
    await gateway.createAuction(snapshot().auction);

    const placed = engine.placeBid('u1', 300_000, 2_000, limits);
    if (!placed.accepted) throw placed.error;
    await gateway.addBid(placed.bid, snapshot().auction);

    await expect(gateway.reconnect()).resolves.toBe(false);
    expect(gateway.getConnectionStatus().reconnectAttempts).toBe(1);

    primary.failing = false;
    await expect(gateway.reconnect()).resolves.toBe(true);

    expect(statuses).toEqual(['DEGRADED', 'ACTIVE']);
    expect(primary.auctions.get('a1')?.currentBid).toBe(300_000);
    expect(primary.bids.get('a1')?.map((b) => b.amount)).toEqual([300_000]);
    expect(gateway.getConnectionStatus()).toEqual(
      expect.objectContaining({ status: 'ACTIVE', pendingReplay: 0, degradedSince: null }),
    );
  });

  it('pings an initialized primary on reconnect instead of re-running setup', async () => {
    primary.failing = true;
    await gateway.setSetting('g1', 'currency_name', 'Gold');
    primary.failing = false;

    await expect(gateway.reconnect()).resolves.toBe(true);

    expect(primary.calls.filter((c) => c === 'init')).toHaveLength(1);
    expect(primary.calls.filter((c) => c === 'ping')).toHaveLength(1);
  });

  it('keeps one journal entry per row while DEGRADED', async () => {
    const { engine, snapshot } = liveAuction();
    primary.failing = true;
    await gateway.createAuction(snapshot().auction);

    const bidders = ['u1', 'u2', 'u1'];
    for (const [i, bidderId] of bidders.entries()) {
      const placed = engine.placeBid(bidderId, 300_000 + i * 50_000, 2_000 + i, limits);
      if (!placed.accepted) throw placed.error;
      await gateway.addBid(placed.bid, snapshot().auction);
    }
    for (let i = 0; i < 5; i += 1) {
      await gateway.updateAuction(snapshot().auction);
    }
    expect(gateway.getConnectionStatus().pendingReplay).toBe(4);

    const undone = engine.undoLast();
    if (!undone.undone) throw undone.error;
    await gateway.removeLastBid(undone.removed, snapshot().auction);
    expect(gateway.getConnectionStatus().pendingReplay).toBe(4);

    primary.failing = false;
    await expect(gateway.reconnect()).resolves.toBe(true);

    expect(primary.bids.get('a1')?.map((b) => b.amount)).toEqual([300_000, 350_000]);
    expect(primary.auctions.get('a1')).toMatchObject({
      currentBid: 350_000,
      currentBidderId: 'u2',
    });
    expect(primary.calls.filter((c) => c === 'saveAuction')).toHaveLength(4);
  });

  it('copies settings to the secondary without journaling them', async () => {
    primary.failing = true;
    await gateway.getSetting('g1', 'role_id');

    await expect(
      gateway.mirrorSettings('g1', new Map([['role_id', 'bidders']])),
    ).resolves.toBe(true);

    expect(secondary.settings.get('g1:role_id')).toBe('bidders');
    expect(gateway.getConnectionStatus().pendingReplay).toBe(0);
  });

  it('shares one probe between concurrent reconnect calls', async () => {
    primary.failing = true;
    await gateway.setSetting('g1', 'currency_name', 'Gold');
    primary.failing = false;

    const [first, second] = await Promise.all([gateway.reconnect(), gateway.reconnect()]);

    expect(first && second).toBe(true);
    expect(gateway.getConnectionStatus().reconnectAttempts).toBe(1);
    expect(primary.settings.get('g1:currency_name')).toBe('Gold');
  });

  it('never throws when both backends fail', async () => {
    const { snapshot } = liveAuction();
    primary.failing = true;
    secondary.failing = true;

    await expect(gateway.createAuction(snapshot().auction)).resolves.toBe(false);
    await expect(gateway.getActiveAuctions()).resolves.toEqual([]);
    await expect(gateway.getSetting('g1', 'role_id')).resolves.toBeNull();
    expect(gateway.getConnectionStatus().secondaryFailures).toBe(3);
  });

  it('removes the latest bid and records the end of an auction', async () => {
    const { engine, snapshot } = liveAuction();
    await gateway.createAuction(snapshot().auction);
    const first = engine.placeBid('u1', 300_000, 2_000, limits);
    const second = engine.placeBid('u2', 350_000, 3_000, limits);
    if (!first.accepted || !second.accepted) throw new Error('bids rejected');
    await gateway.addBid(first.bid, snapshot().auction);
    await gateway.addBid(second.bid, snapshot().auction);

    const undone = engine.undoLast();
    if (!undone.undone) throw undone.error;
    await gateway.removeLastBid(undone.removed, snapshot().auction);
    expect((await gateway.getBids('a1')).map((b) => b.sequenceNo)).toEqual([1]);

    const ended = engine.end(9_000);
    if (!ended.ended) throw ended.error;
    await gateway.endAuction(snapshot().auction, ended.outcome);

    const stored = await gateway.getAuction('a1');
    expect(stored).toEqual(
      expect.objectContaining({ status: 'ENDED', finalPrice: 300_000, winnerId: 'u1', endedAt: 9_000 }),
    );
    await expect(gateway.getActiveAuction('g1')).resolves.toBeNull();
    await expect(gateway.getRecentAuctions('g1')).resolves.toHaveLength(1);
  });
});

describe('PersistenceGateway startup', () => {
  const settings = {
    databaseUrl: 'postgresql://unused',
    sqlitePath: ':memory:',
    retryAttempts: 2,
    retryBaseDelayMs: 0,
    probeIntervalMs: 0,
  };

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('starts DEGRADED when only the secondary is reachable', async () => {
    const primary = new InMemoryBackend('postgres');
    primary.failing = true;
    const gateway = new PersistenceGateway(primary, new InMemoryBackend('sqlite'), settings);

    await gateway.onModuleInit();

    expect(gateway.getConnectionStatus().status).toBe('DEGRADED');
    await gateway.onModuleDestroy();
  });

  it('runs setup on reconnect when the primary was down at startup', async () => {
    const primary = new InMemoryBackend('postgres');
    primary.failing = true;
    const gateway = new PersistenceGateway(primary, new InMemoryBackend('sqlite'), settings);
    await gateway.onModuleInit();

    primary.failing = false;
    await expect(gateway.reconnect()).resolves.toBe(true);

    expect(primary.calls.filter((c) => c === 'init')).toHaveLength(3);
    expect(primary.calls).not.toContain('ping');
    await gateway.onModuleDestroy();
  });

  it('fails startup when neither backend is reachable', async () => {
    const primary = new InMemoryBackend('postgres');
    const secondary = new InMemoryBackend('sqlite');
    primary.failing = true;
    secondary.failing = true;
    const gateway = new PersistenceGateway(primary, secondary, settings);

    const startup = gateway.onModuleInit();
    await expect(startup).rejects.toBeInstanceOf(StorageError);
    await expect(startup).rejects.toThrow('No persistence backend is reachable (postgres, sqlite)');
    await gateway.onModuleDestroy();
  });
});

describe('PersistenceGateway timing', () => {
  let primary: InMemoryBackend;
  let gateway: PersistenceGateway;
  let statuses: BackendStatus[];

  beforeEach(async () => {
    jest.useFakeTimers({ now: 1_700_000_000_000 });
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    ({ primary, gateway } = inMemoryPersistence(3, {
      retryBaseDelayMs: 100,
      probeIntervalMs: 5_000,
    }));
    statuses = [];
    gateway.onStatusChange((status) => statuses.push(status));
    await gateway.onModuleInit();
  });

  afterEach(async () => {
    await gateway.onModuleDestroy();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  const settingWrites = (): number => primary.calls.filter((c) => c === 'setSetting').length;

  it('backs off exponentially between primary attempts', async () => {
    primary.failing = true;
    let written: boolean | null = null;
    void gateway.setSetting('g1', 'currency_name', 'Gold').then((ok) => {
      written = ok;
    });

    await jest.advanceTimersByTimeAsync(0);
    expect(settingWrites()).toBe(1);

    await jest.advanceTimersByTimeAsync(99);
    expect(settingWrites()).toBe(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(settingWrites()).toBe(2);

    await jest.advanceTimersByTimeAsync(199);
    expect(settingWrites()).toBe(2);
    await jest.advanceTimersByTimeAsync(1);
    expect(settingWrites()).toBe(3);

    expect(written).toBe(true);
    expect(statuses).toEqual(['DEGRADED']);
  });

  it('returns to ACTIVE on its own once the primary answers again', async () => {
    primary.failing = true;
    const write = gateway.setSetting('g1', 'currency_name', 'Gold');
    await jest.advanceTimersByTimeAsync(300);
    await expect(write).resolves.toBe(true);
    expect(gateway.getConnectionStatus().status).toBe('DEGRADED');

    await jest.advanceTimersByTimeAsync(5_000);
    expect(gateway.getConnectionStatus()).toMatchObject({
      status: 'DEGRADED',
      reconnectAttempts: 1,
      pendingReplay: 1,
    });

    primary.failing = false;
    await jest.advanceTimersByTimeAsync(5_000);

    expect(statuses).toEqual(['DEGRADED', 'ACTIVE']);
    expect(gateway.getConnectionStatus()).toMatchObject({
      status: 'ACTIVE',
      reconnectAttempts: 2,
      pendingReplay: 0,
    });
    expect(primary.settings.get('g1:currency_name')).toBe('Gold');
    expect(jest.getTimerCount()).toBe(0);
  });
});
