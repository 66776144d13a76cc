import { HttpStatus } from '@nestjs/common';
import request from 'supertest';
import {
  closeTestApp,
  createTestApp,
  TestAppContext,
} from './utils/create-test-app.util';

describe('Proxy Pool Service (e2e)', () => {
  let testContext: TestAppContext;

  beforeEach(async () => {
    testContext = await createTestApp();
  });

  afterEach(async () => {
    await closeTestApp(testContext);
  });

  describe('Health Check', () => {
    it('should return health status', async () => {
      await request(testContext.app.getHttpServer())
        .get('/health/check')
        .expect(HttpStatus.OK)
        .expect('I am ok');
    });
  });

  describe('Unknown route', () => {
    it('should answer 404 outside the JSON-RPC envelope', async () => {
      const response = await request(testContext.app.getHttpServer())
        .get('/api/unknown')
        .expect(HttpStatus.NOT_FOUND);

      expect(response.body).toMatchObject({
        statusCode: 404,
        message: 'Cannot GET /api/unknown',
      });
    });
  });
});
