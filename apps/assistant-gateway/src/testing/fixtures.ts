import { RateLimiter, type Clock } from '@session-governor/core';

import { loadConfig, type AppConfig } from '../config';
import type { ToolGovernance } from '../services/tools/governed-tool';
import type { HttpResponseLike } from '../services/tools/http-client';
import { createLogger, type AppLogger } from '../telemetry/logger';
import { createMetrics, type GatewayMetrics } from '../telemetry/metrics';

export function createTestConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ...overrides });
}

export function createTestLogger(): AppLogger {
  return createLogger({ level: 'silent' });
}

export function createTestMetrics(): GatewayMetrics {
  return createMetrics({ collectDefaults: false });
}

/** Mutable clock for driving TTLs and rate-limit windows by hand. */
export interface ManualClock {
  now: Clock;
  advance(ms: number): void;
  set(ms: number): void;
}

export function createManualClock(start = 1_000_000): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
}

export function createTestGovernance(
  limiter: RateLimiter = new RateLimiter({ maxRequests: 100 }),
): ToolGovernance {
  return {
    rateLimiter: limiter,
    metrics: createTestMetrics(),
    logger: createTestLogger(),
  };
}

export function jsonResponse(body: unknown, status = 200): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

export function textResponse(body: string, status = 200): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => JSON.parse(body),
    text: async () => body,
  };
}

/** Read a counter's value for one label set from the registry. */
export async function counterValue(
  metrics: GatewayMetrics,
  name: string,
  labels: Record<string, string>,
): Promise<number> {
  const metric = metrics.registry.getSingleMetric(name);
  if (!metric) {
    return 0;
  }
  const { values } = await metric.get();
  const match = values.find((sample) =>
    Object.entries(labels).every(([key, value]) => sample.labels[key] === value),
  );
  return match?.value ?? 0;
}
