/**
 * Rate Limit Middleware Tests
 */

import express from 'express';
import { TestServer, startTestServer } from '../../__tests__/helpers/server';
import { RateLimitManager } from '../../lib/rate-limit/rate-limit.manager';
import { rateLimitMiddleware } from '../rate-limit.middleware';

describe('rateLimitMiddleware', () => {
  const manager = new RateLimitManager();
  let server: TestServer;

  beforeAll(async () => {
    const app = express();
    app.use(
      rateLimitMiddleware(
        {
          windowMs: 60000,
          maxRequests: 2,
          message: 'Slow down',
          keyGenerator: (req) => `client:${req.header('x-client-id') ?? 'anonymous'}`,
        },
        manager
      )
    );
    app.get('/ping', (_req, res) => {
      res.json({ ok: true });
    });
    server = await startTestServer(app);
  });

  afterAll(async () => {
    await server.close();
    manager.destroy();
  });

  beforeEach(() => {
    manager.clear();
  });

  function ping(clientId: string): Promise<Response> {
    return fetch(`${server.baseUrl}/ping`, { headers: { 'x-client-id': clientId } });
  }

  it('should pass requests under the limit and set headers', async () => {
    const response = await ping('a');

    expect(response.status).toBe(200);
    expect(response.headers.get('ratelimit-limit')).toBe('2');
    expect(response.headers.get('ratelimit-remaining')).toBe('1');
    expect(response.headers.get('x-ratelimit-remaining')).toBe('1');
  });

  it('should answer 429 once the limit is reached', async () => {
    await ping('a');
    await ping('a');
    const response = await ping('a');
    const retryAfter = Number(response.headers.get('retry-after'));

    expect(response.status).toBe(429);
    expect(retryAfter).toBeGreaterThan(0);
    expect(await response.json()).toMatchObject({ success: false, error: 'Slow down', retryAfter });
  });

  it('should count clients separately', async () => {
    await ping('a');
    await ping('a');

    expect((await ping('b')).status).toBe(200);
    expect(manager.getStats().activeKeys).toBe(2);
  });
});
