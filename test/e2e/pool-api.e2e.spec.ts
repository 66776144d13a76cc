import { StoreUnavailableAppError } from '@common/errors/store-unavailable.app-error';
import { JsonRpc } from '@common/json-rpc/json-rpc';
import { ProxyHandle } from '@modules/pool/interfaces/proxy-handle.interface';
import { HttpStatus } from '@nestjs/common';
import request from 'supertest';
import {
  closeTestApp,
  createTestApp,
  TestAppContext,
} from './utils/create-test-app.util';

describe('Pool API (e2e)', () => {
  let testContext: TestAppContext;
  let sourceId: number;

  function post(path: string, body: object) {
    return request(testContext.app.getHttpServer())
      .post(path)
      .send(body)
      .expect(HttpStatus.OK);
  }

  beforeEach(async () => {
    testContext = await createTestApp();
    const { proxies, clock } = testContext;
    sourceId = proxies.addSource('shop-a');
    proxies.addProxy({
      sourceId,
      address: '10.1.0.1:3128',
      priority: 10,
      lastTouched: clock.secondsAgo(3600),
    });
    proxies.addProxy({
      sourceId,
      address: '10.1.0.2:3128',
      priority: 5,
      lastTouched: clock.secondsAgo(3600),
    });
  });

  afterEach(async () => {
    await closeTestApp(testContext);
  });

  describe('POST /api/pool/acquire', () => {
    it('should hand out the highest priority proxy', async () => {
      const response = await post('/api/pool/acquire', { sourceId });

      expect(response.body).toEqual({
        status: 'ok',
        payload: {
          id: 1,
          address: '10.1.0.1:3128',
          sourceId,
          providerId: null,
          priority: 10,
          usageCooldownSec: 30,
          assignedAt: '2026-01-01T12:00:00.000Z',
        },
      });
    });

    it('should answer a retryable error once the pool is exhausted', async () => {
      await post('/api/pool/acquire', { sourceId });
      await post('/api/pool/acquire', { sourceId });

      const response = await post('/api/pool/acquire', { sourceId });

      expect(response.body).toEqual({
        status: 'error',
        code: 'ERR_POOL_EXHAUSTED',
        message: `No proxy available for source ${sourceId}, retry later`,
        retryable: true,
        payload: { sourceId, candidatesTried: 2 },
      });
    });

    it('should reject an unknown source', async () => {
      const response = await post('/api/pool/acquire', { sourceId: 42 });

      expect(response.body).toMatchObject({
        status: 'error',
        code: 'ERR_SOURCE_NOT_FOUND',
        retryable: false,
        payload: { sourceId: 42 },
      });
    });

    it('should reject a malformed request', async () => {
      const response = await post('/api/pool/acquire', { sourceId: 'abc' });

      expect(response.body).toMatchObject({
        status: 'error',
        code: 'ERR_VALIDATION_FAILED',
        message: 'Validation failed on fields sourceId',
        retryable: false,
      });
    });
  });

  describe('Store outage', () => {
    it('should answer a retryable store error', async () => {
      testContext.proxies.failOn(
        'listEligible',
        new StoreUnavailableAppError(
          'listEligible',
          new Error('connect ECONNREFUSED 127.0.0.1:5432'),
        ),
      );

      const response = await post('/api/pool/acquire', { sourceId });

      expect(response.body).toEqual({
        status: 'error',
        code: 'ERR_STORE_UNAVAILABLE',
        message: 'Store is unavailable, try again later',
        retryable: true,
      });
    });
  });

  describe('POST /api/pool/overview', () => {
    it('should count proxies per source', async () => {
      const empty = testContext.proxies.addSource('shop-b');
      await post('/api/pool/report', { proxyId: 2, statusCode: 0 });

      const response = await post('/api/pool/overview', {});

      expect(response.body).toEqual({
        status: 'ok',
        payload: [
          { sourceId, total: 2, blocked: 1, eligible: 1 },
          { sourceId: empty, total: 0, blocked: 0, eligible: 0 },
        ],
      });
    });
  });

  describe('POST /api/pool/report', () => {
    it('should block a proxy after repeated rejections', async () => {
      await post('/api/pool/report', { proxyId: 1, statusCode: 403 });
      await post('/api/pool/report', { proxyId: 1, statusCode: 403 });
      const response = await post('/api/pool/report', {
        proxyId: 1,
        statusCode: 403,
      });

      expect(response.body).toEqual({
        status: 'ok',
        payload: {
          proxyId: 1,
          statusCode: 403,
          blocked: true,
          blockedReason: 'repeated_failures',
        },
      });

      const acquired = await post('/api/pool/acquire', { sourceId });
      expect(JsonRpc.unwrap<ProxyHandle>(acquired.body).id).toBe(2);
    });

    it('should reject a status outside the catalog', async () => {
      const response = await post('/api/pool/report', {
        proxyId: 1,
        statusCode: 777,
      });

      expect(response.body).toMatchObject({
        status: 'error',
        code: 'ERR_UNKNOWN_STATUS',
        payload: { statusCode: 777 },
      });
    });

    it('should reject an unknown proxy', async () => {
      const response = await post('/api/pool/report', {
        proxyId: 99,
        statusCode: 200,
      });

      expect(response.body).toMatchObject({
        status: 'error',
        code: 'ERR_PROXY_NOT_FOUND',
        payload: { proxyId: 99 },
      });
    });
  });

  describe('POST /api/pool/failure-ratio', () => {
    it('should use the configured window by default', async () => {
      await post('/api/pool/report', { proxyId: 2, statusCode: 200 });
      await post('/api/pool/report', { proxyId: 2, statusCode: 404 });

      const response = await post('/api/pool/failure-ratio', { proxyId: 2 });

      expect(response.body).toEqual({
        status: 'ok',
        payload: { proxyId: 2, windowSec: 3600, ratio: 0.5 },
      });
    });
  });

  describe('POST /api/pool/statistics', () => {
    it('should list counters per status', async () => {
      await post('/api/pool/report', { proxyId: 2, statusCode: 200 });
      await post('/api/pool/report', { proxyId: 2, statusCode: 200 });

      const response = await post('/api/pool/statistics', { proxyId: 2 });

      expect(response.body).toEqual({
        status: 'ok',
        payload: [
          {
            proxyId: 2,
            statusCode: 200,
            description: 'OK',
            counter: 2,
            lastReportedAt: '2026-01-01T12:00:00.000Z',
          },
        ],
      });
    });
  });

  describe('POST /api/reconciliation/tick', () => {
    it('should bring a stalled source back', async () => {
      await post('/api/pool/report', { proxyId: 1, statusCode: 0 });
      await post('/api/pool/report', { proxyId: 2, statusCode: 0 });

      const exhausted = await post('/api/pool/acquire', { sourceId });
      expect(exhausted.body.code).toBe('ERR_POOL_EXHAUSTED');

      testContext.clock.advanceSeconds(600);
      const tick = await post('/api/reconciliation/tick', {});

      expect(tick.body).toEqual({
        status: 'ok',
        payload: {
          sources: 1,
          reconciled: 1,
          stale: 1,
          unblocked: 2,
          skipped: [],
          failed: [],
        },
      });

      const acquired = await post('/api/pool/acquire', { sourceId });
      expect(JsonRpc.unwrap<ProxyHandle>(acquired.body).id).toBe(1);
    });
  });

  describe('POST /api/reconciliation/source', () => {
    it('should reject an unknown source', async () => {
      const response = await post('/api/reconciliation/source', {
        sourceId: 42,
      });

      expect(response.body).toEqual({
        status: 'error',
        code: 'ERR_SOURCE_NOT_FOUND',
        message: 'Source 42 does not exist',
        retryable: false,
        payload: { sourceId: 42 },
      });
    });

    it('should leave a recently used source alone', async () => {
      await post('/api/pool/acquire', { sourceId });
      testContext.clock.advanceSeconds(60);

      const response = await post('/api/reconciliation/source', { sourceId });

      expect(response.body).toEqual({
        status: 'ok',
        payload: { sourceId, stale: false, unblocked: 0, idleSec: 60 },
      });
    });
  });
});
