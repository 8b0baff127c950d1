import { describe, expect, it, vi } from 'vitest';

import type { LoggerLike } from '../src/logging';
import { RateLimiter } from '../src/rate-limit/rate-limiter';

const START = 1_700_000_000_000;
const MINUTE = 60_000;

function createLimiter(overrides: { maxRequests?: number; logger?: LoggerLike } = {}) {
  let now = START;
  const limiter = new RateLimiter({
    maxRequests: overrides.maxRequests ?? 10,
    windowMs: MINUTE,
    blockDurationMs: 5 * MINUTE,
    clock: () => now,
    logger: overrides.logger,
  });

  return {
    limiter,
    setNow(value: number) {
      now = value;
    },
  };
}

function exhaust(limiter: RateLimiter, identity: string, count: number): boolean[] {
  return Array.from({ length: count }, () => limiter.isAllowed(identity));
}

describe('RateLimiter', () => {
  it('admits the first ten requests in a minute and blocks on the eleventh', () => {
    const { limiter } = createLimiter();

    expect(exhaust(limiter, 'user-1', 10)).toEqual(Array(10).fill(true));
    expect(limiter.isAllowed('user-1')).toBe(false);
    expect(limiter.status('user-1')).toEqual({
      blocked: true,
      blockedUntil: START + 5 * MINUTE,
      remainingSeconds: 300,
    });
  });

  it('rejects during the block without moving blockedUntil', () => {
    const { limiter, setNow } = createLimiter();
    exhaust(limiter, 'user-1', 11);

    setNow(START + 2 * MINUTE);
    expect(limiter.isAllowed('user-1')).toBe(false);
    setNow(START + 5 * MINUTE - 1);
    expect(limiter.isAllowed('user-1')).toBe(false);

    const status = limiter.status('user-1');
    expect(status.blocked && status.blockedUntil).toBe(START + 5 * MINUTE);
  });

  it('evaluates the first request after the block as a fresh window', () => {
    const { limiter, setNow } = createLimiter();
    exhaust(limiter, 'user-1', 11);

    setNow(START + 5 * MINUTE + 1);

    expect(limiter.isAllowed('user-1')).toBe(true);
    expect(limiter.status('user-1')).toEqual({
      blocked: false,
      requestsInWindow: 1,
      remainingRequests: 9,
    });
  });

  it('only counts requests inside the trailing window', () => {
    const { limiter, setNow } = createLimiter();
    exhaust(limiter, 'user-1', 10);

    setNow(START + MINUTE);

    expect(limiter.isAllowed('user-1')).toBe(true);
    expect(limiter.status('user-1')).toMatchObject({ blocked: false, requestsInWindow: 1 });
  });

  it('floors the remaining block time to whole seconds', () => {
    const { limiter, setNow } = createLimiter();
    exhaust(limiter, 'user-1', 11);

    setNow(START + 1500);

    expect(limiter.status('user-1')).toMatchObject({ blocked: true, remainingSeconds: 298 });
  });

  it('reports zero remaining seconds for a lapsed block not yet observed', () => {
    const { limiter, setNow } = createLimiter();
    exhaust(limiter, 'user-1', 11);

    setNow(START + 10 * MINUTE);

    expect(limiter.status('user-1')).toMatchObject({ blocked: true, remainingSeconds: 0 });
  });

  it('keeps identities independent', () => {
    const { limiter } = createLimiter();
    exhaust(limiter, 'user-1', 11);

    expect(limiter.isAllowed('user-2')).toBe(true);
    expect(limiter.status('user-2')).toEqual({
      blocked: false,
      requestsInWindow: 1,
      remainingRequests: 9,
    });
  });

  it('reports full quota for an unknown identity', () => {
    const { limiter } = createLimiter();

    expect(limiter.status('nobody')).toEqual({
      blocked: false,
      requestsInWindow: 0,
      remainingRequests: 10,
    });
  });

  it('lifts blocks and forgets history on reset', () => {
    const { limiter } = createLimiter();
    exhaust(limiter, 'user-1', 11);

    limiter.reset('user-1');

    expect(limiter.isAllowed('user-1')).toBe(true);
    expect(limiter.status('user-1')).toMatchObject({ blocked: false, requestsInWindow: 1 });
  });

  it('returns to an empty state when cleared twice', () => {
    const { limiter } = createLimiter();
    exhaust(limiter, 'user-1', 11);
    exhaust(limiter, 'user-2', 3);

    limiter.clear();
    limiter.clear();

    expect(limiter.status('user-1')).toEqual({
      blocked: false,
      requestsInWindow: 0,
      remainingRequests: 10,
    });
    expect(limiter.status('user-2')).toEqual({
      blocked: false,
      requestsInWindow: 0,
      remainingRequests: 10,
    });
  });

  it('logs when an identity gets blocked', () => {
    const logger = { warn: vi.fn(), info: vi.fn() };
    const { limiter } = createLimiter({ logger });

    exhaust(limiter, 'user-1', 11);

    expect(logger.warn).toHaveBeenCalledWith(
      { identity: 'user-1', maxRequests: 10, blockDurationMs: 5 * MINUTE },
      'Rate limit exceeded, identity blocked',
    );
  });

  it('requires the window capacity to exceed the threshold', () => {
    expect(() => new RateLimiter({ maxRequests: 10, windowCapacity: 10 })).toThrow(
      'windowCapacity (10) must exceed maxRequests (10)',
    );
  });

  it('rejects window settings that are not positive finite numbers', () => {
    expect(() => new RateLimiter({ windowMs: Number.NaN })).toThrow(
      'RateLimiter windowMs must be a positive number, received NaN',
    );
    expect(() => new RateLimiter({ windowMs: 0 })).toThrow('windowMs must be a positive number');
    expect(() => new RateLimiter({ blockDurationMs: -1 })).toThrow(
      'RateLimiter blockDurationMs must be a positive number, received -1',
    );
    expect(() => new RateLimiter({ maxRequests: 10, windowCapacity: 50.5 })).toThrow(
      'RateLimiter windowCapacity must be an integer, received 50.5',
    );
  });

  it('forgets identities that stay idle for a whole window', () => {
    const { limiter, setNow } = createLimiter();
    exhaust(limiter, 'user-1', 3);
    exhaust(limiter, 'user-2', 11);
    expect(limiter.trackedIdentities).toBe(2);

    setNow(START + 6 * MINUTE);
    expect(limiter.isAllowed('user-3')).toBe(true);

    expect(limiter.trackedIdentities).toBe(1);
    expect(limiter.status('user-2')).toEqual({
      blocked: false,
      requestsInWindow: 0,
      remainingRequests: 10,
    });
  });

  it('keeps only in-window timestamps for an active identity', () => {
    const { limiter, setNow } = createLimiter();
    exhaust(limiter, 'user-1', 10);

    setNow(START + MINUTE + 1);
    exhaust(limiter, 'user-1', 10);

    expect(limiter.status('user-1')).toEqual({
      blocked: false,
      requestsInWindow: 10,
      remainingRequests: 0,
    });
  });
});
