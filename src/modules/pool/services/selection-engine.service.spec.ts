import { CLOCK } from '@common/time';
import { PoolExhaustedAppError } from '@modules/pool/errors/pool-exhausted.app-error';
import { SourceNotFoundAppError } from '@modules/pool/errors/source-not-found.app-error';
import { PROXY_RECORD_STORE } from '@modules/pool/interfaces/proxy-record-store.interface';
import { PoolConfig } from '@modules/pool/pool.config';
import { SelectionEngineService } from '@modules/pool/services/selection-engine.service';
import { Test } from '@nestjs/testing';
import { InMemoryProxyRecordStore } from '../../../../test/fakes/in-memory-proxy-record.store';
import { ManualClock } from '../../../../test/fakes/manual-clock';

describe('SelectionEngineService', () => {
  let store: InMemoryProxyRecordStore;
  let clock: ManualClock;
  let engine: SelectionEngineService;
  let sourceId: number;

  beforeEach(async () => {
    store = new InMemoryProxyRecordStore();
    clock = new ManualClock();
    sourceId = store.addSource('shop-a');

    const module = await Test.createTestingModule({
      providers: [
        SelectionEngineService,
        { provide: PROXY_RECORD_STORE, useValue: store },
        { provide: CLOCK, useValue: clock },
        { provide: PoolConfig, useValue: { candidateLimit: 100 } },
      ],
    }).compile();

    engine = module.get(SelectionEngineService);
  });

  it('Should hand out proxies by priority and respect cooldowns', async () => {
    const p1 = store.addProxy({
      sourceId,
      priority: 100,
      lastTouched: clock.secondsAgo(60),
    });
    const p2 = store.addProxy({
      sourceId,
      priority: 90,
      lastTouched: clock.secondsAgo(60),
    });

    const first = await engine.acquire(sourceId);
    expect(first.id).toBe(p1.id);
    expect(first.assignedAt).toEqual(clock.now());
    expect(store.snapshot(p1.id)?.lastTouched).toEqual(clock.now());

    const second = await engine.acquire(sourceId);
    expect(second.id).toBe(p2.id);

    await expect(engine.acquire(sourceId)).rejects.toBeInstanceOf(
      PoolExhaustedAppError,
    );

    clock.advanceSeconds(30);

    const third = await engine.acquire(sourceId);
    expect(third.id).toBe(p1.id);
  });

  it('Should keep a proxy in cooldown until the full cooldown has passed', async () => {
    const proxy = store.addProxy({
      sourceId,
      usageCooldownSec: 60,
      lastTouched: clock.secondsAgo(59),
    });

    await expect(engine.acquire(sourceId)).rejects.toMatchObject({
      code: 'ERR_POOL_EXHAUSTED',
      candidatesTried: 1,
    });

    clock.advanceSeconds(1);

    await expect(engine.acquire(sourceId)).resolves.toMatchObject({
      id: proxy.id,
    });
  });

  it('Should skip blocked proxies', async () => {
    store.addProxy({
      sourceId,
      priority: 10,
      blocked: true,
      lastTouched: clock.secondsAgo(3600),
    });
    const open = store.addProxy({
      sourceId,
      priority: 1,
      lastTouched: clock.secondsAgo(3600),
    });

    const handle = await engine.acquire(sourceId);

    expect(handle.id).toBe(open.id);
  });

  it('Should not assign a proxy blocked after the candidates were listed', async () => {
    const top = store.addProxy({
      sourceId,
      priority: 10,
      lastTouched: clock.secondsAgo(3600),
    });
    const next = store.addProxy({
      sourceId,
      priority: 1,
      lastTouched: clock.secondsAgo(3600),
    });

    const pending = engine.acquire(sourceId);
    await store.setBlocked(top.id, true, clock.secondsAgo(3600));
    const handle = await pending;

    expect(handle.id).toBe(next.id);
    expect(store.snapshot(handle.id)?.blocked).toBe(false);
    expect(store.snapshot(top.id)?.lastTouched).toEqual(clock.secondsAgo(3600));
  });

  it('Should break priority ties by lowest id', async () => {
    const a = store.addProxy({ sourceId, lastTouched: clock.secondsAgo(600) });
    store.addProxy({ sourceId, lastTouched: clock.secondsAgo(600) });

    const handle = await engine.acquire(sourceId);

    expect(handle.id).toBe(a.id);
  });

  it('Should only consider proxies of the requested source', async () => {
    const otherSource = store.addSource('shop-b');
    store.addProxy({
      sourceId: otherSource,
      priority: 100,
      lastTouched: clock.secondsAgo(600),
    });
    const own = store.addProxy({ sourceId, lastTouched: clock.secondsAgo(600) });

    const handle = await engine.acquire(sourceId);

    expect(handle).toEqual({
      id: own.id,
      address: own.address,
      sourceId,
      providerId: null,
      priority: 0,
      usageCooldownSec: 30,
      assignedAt: clock.now(),
    });
  });

  it('Should never hand the same proxy to concurrent callers', async () => {
    for (let i = 0; i < 3; i += 1) {
      store.addProxy({ sourceId, lastTouched: clock.secondsAgo(600) });
    }

    const results = await Promise.allSettled(
      Array.from({ length: 5 }, () => engine.acquire(sourceId)),
    );

    const ids = results.flatMap((result) =>
      result.status === 'fulfilled' ? [result.value.id] : [],
    );
    const rejected = results.flatMap((result) =>
      result.status === 'rejected' ? [result.reason] : [],
    );

    expect(ids.sort((a, b) => a - b)).toEqual([1, 2, 3]);
    expect(rejected).toHaveLength(2);
    rejected.forEach((reason) =>
      expect(reason).toBeInstanceOf(PoolExhaustedAppError),
    );
  });

  it('Should report an exhausted pool for a source without proxies', async () => {
    await expect(engine.acquire(sourceId)).rejects.toMatchObject({
      code: 'ERR_POOL_EXHAUSTED',
      sourceId,
      candidatesTried: 0,
    });
  });

  it('Should reject an unknown source', async () => {
    await expect(engine.acquire(999)).rejects.toBeInstanceOf(
      SourceNotFoundAppError,
    );
  });

  it('Should pass store failures through', async () => {
    store.addProxy({ sourceId, lastTouched: clock.secondsAgo(600) });
    store.failOn('markAssigned', new Error('connection terminated'));

    await expect(engine.acquire(sourceId)).rejects.toThrow(
      'connection terminated',
    );
  });
});
