import { afterEach, describe, expect, it } from 'vitest';

import type { GatewayFastifyInstance } from '../server';
import { createTestServer } from '../testing/server';

const ADMIN_ENV = { ADMIN_API_TOKEN: 'test-secret' };
const authorization = 'Bearer test-secret';

describe('admin routes', () => {
  let server: GatewayFastifyInstance | undefined;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  it('are not registered without an admin token', async () => {
    const setup = await createTestServer();
    server = setup.server;

    const response = await server.inject({ method: 'GET', url: '/admin/cache', headers: { authorization } });

    expect(response.statusCode).toBe(404);
  });

  it('reject requests with a wrong token', async () => {
    const setup = await createTestServer({ env: ADMIN_ENV });
    server = setup.server;

    const response = await server.inject({
      method: 'GET',
      url: '/admin/cache',
      headers: { authorization: 'Bearer not-the-secret' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'AdminAuthError', message: 'Invalid admin credentials' });
  });

  it('report and reset rate-limit state for a user', async () => {
    const setup = await createTestServer({ env: { ...ADMIN_ENV, RATE_LIMIT_MAX_REQUESTS: '10' } });
    server = setup.server;
    setup.rateLimiter.isAllowed('user-1');
    setup.rateLimiter.isAllowed('user-1');

    const before = await server.inject({ method: 'GET', url: '/admin/rate-limits/user-1', headers: { authorization } });
    expect(before.json()).toEqual({
      userId: 'user-1',
      blocked: false,
      requestsInWindow: 2,
      remainingRequests: 8,
    });

    const reset = await server.inject({ method: 'DELETE', url: '/admin/rate-limits/user-1', headers: { authorization } });
    expect(reset.json()).toEqual({ userId: 'user-1', reset: true });
    expect(setup.rateLimiter.status('user-1')).toEqual({
      blocked: false,
      requestsInWindow: 0,
      remainingRequests: 10,
    });
  });

  it('report and clear tool cache statistics', async () => {
    const setup = await createTestServer({ env: ADMIN_ENV });
    server = setup.server;
    setup.caches.cryptoPrice.set('btc', 'cached price');
    setup.caches.cryptoPrice.get('btc');

    const stats = await server.inject({ method: 'GET', url: '/admin/cache', headers: { authorization } });
    expect(stats.statusCode).toBe(200);
    expect(stats.json().caches.cryptoPrice).toEqual({
      size: 1,
      maxSize: 100,
      hits: 1,
      misses: 0,
      hitRate: 1,
      ttlSeconds: 30,
    });

    const cleared = await server.inject({ method: 'DELETE', url: '/admin/cache', headers: { authorization } });
    expect(cleared.json()).toEqual({ cleared: ['cryptoPrice', 'weather', 'webSearch'] });
    expect(setup.caches.cryptoPrice.stats().size).toBe(0);
  });
});
