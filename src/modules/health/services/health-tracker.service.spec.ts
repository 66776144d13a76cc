import { CLOCK } from '@common/time';
import { HealthConfig } from '@modules/health/health.config';
import { UnknownStatusAppError } from '@modules/health/errors/unknown-status.app-error';
import { USAGE_STATISTIC_STORE } from '@modules/health/interfaces/usage-statistic-store.interface';
import {
  BlockingReason,
  DEFAULT_BLOCKING_SETTINGS,
} from '@modules/health/policy/blocking-policy';
import { HealthTrackerService } from '@modules/health/services/health-tracker.service';
import { ProxyNotFoundAppError } from '@modules/pool/errors/proxy-not-found.app-error';
import { PROXY_RECORD_STORE } from '@modules/pool/interfaces/proxy-record-store.interface';
import { Test } from '@nestjs/testing';
import { InMemoryProxyRecordStore } from '../../../../test/fakes/in-memory-proxy-record.store';
import { InMemoryUsageStatisticStore } from '../../../../test/fakes/in-memory-usage-statistic.store';
import { ManualClock } from '../../../../test/fakes/manual-clock';

describe('HealthTrackerService', () => {
  let proxies: InMemoryProxyRecordStore;
  let statistics: InMemoryUsageStatisticStore;
  let clock: ManualClock;
  let tracker: HealthTrackerService;
  let sourceId: number;
  let proxyId: number;

  async function createTracker(overrides: Partial<HealthConfig> = {}) {
    const module = await Test.createTestingModule({
      providers: [
        HealthTrackerService,
        { provide: PROXY_RECORD_STORE, useValue: proxies },
        { provide: USAGE_STATISTIC_STORE, useValue: statistics },
        { provide: CLOCK, useValue: clock },
        {
          provide: HealthConfig,
          useValue: {
            ...DEFAULT_BLOCKING_SETTINGS,
            windowSec: 3600,
            ...overrides,
          },
        },
      ],
    }).compile();

    return module.get(HealthTrackerService);
  }

  beforeEach(async () => {
    proxies = new InMemoryProxyRecordStore();
    statistics = new InMemoryUsageStatisticStore();
    clock = new ManualClock();
    sourceId = proxies.addSource('shop-a');
    proxyId = proxies.addProxy({
      sourceId,
      lastTouched: clock.secondsAgo(600),
    }).id;
    tracker = await createTracker();
  });

  describe('report', () => {
    it('Should count a successful outcome without blocking', async () => {
      const result = await tracker.report(proxyId, 200);

      expect(result).toEqual({ proxyId, statusCode: 200, blocked: false });
      expect(await tracker.statisticsOf(proxyId)).toEqual([
        {
          proxyId,
          statusCode: 200,
          description: 'OK',
          counter: 1,
          lastReportedAt: clock.now(),
        },
      ]);
    });

    it('Should accumulate counters per status code', async () => {
      await tracker.report(proxyId, 404);
      await tracker.report(proxyId, 200);
      await tracker.report(proxyId, 404);

      const counters = (await tracker.statisticsOf(proxyId)).map(
        ({ statusCode, counter }) => [statusCode, counter],
      );
      expect(counters).toEqual([
        [200, 1],
        [404, 2],
      ]);
    });

    it('Should reject a status outside the catalog without recording it', async () => {
      await expect(tracker.report(proxyId, 777)).rejects.toBeInstanceOf(
        UnknownStatusAppError,
      );
      expect(statistics.reportCount()).toBe(0);
    });

    it('Should reject an unknown proxy', async () => {
      await expect(tracker.report(999, 200)).rejects.toBeInstanceOf(
        ProxyNotFoundAppError,
      );
      expect(statistics.reportCount()).toBe(0);
    });

    it('Should block after consecutive blocking statuses reach the threshold', async () => {
      await expect(tracker.report(proxyId, 403)).resolves.toMatchObject({
        blocked: false,
      });
      await expect(tracker.report(proxyId, 429)).resolves.toMatchObject({
        blocked: false,
      });

      clock.advanceSeconds(5);
      const result = await tracker.report(proxyId, 403);

      expect(result).toEqual({
        proxyId,
        statusCode: 403,
        blocked: true,
        blockedReason: BlockingReason.RepeatedFailures,
      });
      expect(proxies.snapshot(proxyId)).toMatchObject({
        blocked: true,
        lastTouched: clock.now(),
      });
      expect(await proxies.listEligible(sourceId, 100)).toEqual([]);
    });

    it('Should restart the run after a success', async () => {
      await tracker.report(proxyId, 403);
      await tracker.report(proxyId, 403);
      await tracker.report(proxyId, 200);

      await expect(tracker.report(proxyId, 403)).resolves.toMatchObject({
        blocked: false,
      });
    });

    it('Should block on a transport failure right away', async () => {
      const result = await tracker.report(proxyId, 0);

      expect(result).toEqual({
        proxyId,
        statusCode: 0,
        blocked: true,
        blockedReason: BlockingReason.TransportFailure,
      });
    });

    it('Should block when the window failure ratio is too high', async () => {
      tracker = await createTracker({ minSamples: 4, maxFailureRatio: 0.75 });

      await tracker.report(proxyId, 404);
      await tracker.report(proxyId, 404);
      await tracker.report(proxyId, 404);
      const result = await tracker.report(proxyId, 404);

      expect(result.blockedReason).toBe(BlockingReason.FailureRatio);
    });

    it('Should reject the report when the proxy vanished before it could be blocked', async () => {
      jest.spyOn(proxies, 'setBlocked').mockResolvedValue(false);

      await expect(tracker.report(proxyId, 0)).rejects.toBeInstanceOf(
        ProxyNotFoundAppError,
      );
    });

    it('Should keep recording for a blocked proxy without unblocking it', async () => {
      await tracker.report(proxyId, 0);

      const result = await tracker.report(proxyId, 200);

      expect(result).toEqual({ proxyId, statusCode: 200, blocked: true });
      expect(proxies.snapshot(proxyId)?.blocked).toBe(true);
      expect(statistics.reportCount()).toBe(2);
    });
  });

  describe('failureRatio', () => {
    it('Should be 0 without reports', async () => {
      await expect(tracker.failureRatio(proxyId)).resolves.toBe(0);
    });

    it('Should count 4xx and 5xx as failures', async () => {
      await tracker.report(proxyId, 200);
      await tracker.report(proxyId, 404);
      await tracker.report(proxyId, 500);
      await tracker.report(proxyId, 301);

      await expect(tracker.failureRatio(proxyId)).resolves.toBe(0.5);
    });

    it('Should only look at reports inside the window', async () => {
      await tracker.report(proxyId, 404);
      clock.advanceSeconds(120);
      await tracker.report(proxyId, 200);

      await expect(tracker.failureRatio(proxyId, 60)).resolves.toBe(0);
      await expect(tracker.failureRatio(proxyId, 120)).resolves.toBe(0.5);

      clock.advanceSeconds(3600);
      await expect(tracker.failureRatio(proxyId)).resolves.toBe(0);
    });

    it('Should reject an unknown proxy', async () => {
      await expect(tracker.failureRatio(999)).rejects.toBeInstanceOf(
        ProxyNotFoundAppError,
      );
    });
  });
});
