import { RateLimiter } from '@session-governor/core';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { GatewayFastifyInstance } from '../server';
import type { SessionAgent } from '../services/session';
import { createManualClock } from '../testing/fixtures';
import { createTestServer, registerLiveSession } from '../testing/server';

function createAgent() {
  const deliver = vi.fn<(message: string) => Promise<void>>().mockResolvedValue(undefined);
  const agent: SessionAgent = { deliver };
  return { agent, deliver };
}

describe('session routes', () => {
  let server: GatewayFastifyInstance | undefined;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  it('lists active sessions in sorted order', async () => {
    const setup = await createTestServer();
    server = setup.server;
    registerLiveSession(setup.registry, 'user-b', createAgent().agent);
    registerLiveSession(setup.registry, 'user-a', createAgent().agent);

    const response = await server.inject({ method: 'GET', url: '/sessions' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ sessions: ['user-a', 'user-b'] });
  });

  it('delivers a message to a live session', async () => {
    const setup = await createTestServer();
    server = setup.server;
    const { agent, deliver } = createAgent();
    registerLiveSession(setup.registry, 'user-1', agent);

    const response = await server.inject({
      method: 'POST',
      url: '/sessions/user-1/messages',
      payload: { text: '  Time for a check-in ' },
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ status: 'delivered', userId: 'user-1' });
    expect(deliver).toHaveBeenCalledWith('Time for a check-in');
  });

  it('returns 404 when the user has no live session', async () => {
    const setup = await createTestServer();
    server = setup.server;

    const response = await server.inject({
      method: 'POST',
      url: '/sessions/ghost/messages',
      payload: { text: 'hello' },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: 'SessionNotFoundError',
      message: 'No active session for user ghost',
    });
  });

  it('rejects empty messages', async () => {
    const setup = await createTestServer();
    server = setup.server;
    const { agent, deliver } = createAgent();
    registerLiveSession(setup.registry, 'user-1', agent);

    const response = await server.inject({
      method: 'POST',
      url: '/sessions/user-1/messages',
      payload: { text: '   ' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'InvalidRequestError', message: 'text must not be empty' });
    expect(deliver).not.toHaveBeenCalled();
  });

  it('applies the per-user rate limit with a retry hint', async () => {
    const clock = createManualClock();
    const setup = await createTestServer({
      rateLimiter: new RateLimiter({ maxRequests: 1, blockDurationMs: 300_000, clock: clock.now }),
    });
    server = setup.server;
    const { agent, deliver } = createAgent();
    registerLiveSession(setup.registry, 'user-1', agent);

    const send = () =>
      setup.server.inject({ method: 'POST', url: '/sessions/user-1/messages', payload: { text: 'ping' } });

    expect((await send()).statusCode).toBe(202);
    const limited = await send();

    expect(limited.statusCode).toBe(429);
    expect(limited.headers['retry-after']).toBe('300');
    expect(deliver).toHaveBeenCalledTimes(1);
  });
});
