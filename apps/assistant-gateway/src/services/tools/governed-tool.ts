import type { RateLimiter, TtlCache } from '@session-governor/core';

import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';

import { describeToolFailure, withToolErrorHandling } from './with-tool-error-handling';

/** Outcome of one upstream call; only successful results are cached. */
export type ToolResult = { ok: true; text: string } | { ok: false; text: string };

/** Shared per-process governance handed to every tool. */
export interface ToolGovernance {
  rateLimiter: RateLimiter;
  metrics: GatewayMetrics;
  logger: AppLogger;
}

export interface GovernedToolDefinition<TArgs extends unknown[]> {
  name: string;
  cache: TtlCache<string>;
  cacheKey(...args: TArgs): string;
  execute(...args: TArgs): Promise<ToolResult>;
  /** Prefix of the message returned when `execute` throws. */
  failureMessage: string;
  /** Log upstream failures at `warn`; for tools whose outage is expected and harmless. */
  silent?: boolean;
}

export type GovernedTool<TArgs extends unknown[]> = (userId: string, ...args: TArgs) => Promise<string>;

export const RATE_LIMITED_MESSAGE =
  'Too many requests in a short time. Ask the user to wait a few minutes before trying again.';

/**
 * Compose the rate limiter, the tool's TTL cache and the error fallback
 * around an upstream call. The limiter is consulted first so that cached
 * answers still count against the user's budget.
 */
export function createGovernedTool<TArgs extends unknown[]>(
  governance: ToolGovernance,
  definition: GovernedToolDefinition<TArgs>,
): GovernedTool<TArgs> {
  const { rateLimiter, metrics, logger } = governance;
  const tool = definition.name;

  const fetchAndStore = withToolErrorHandling(
    tool,
    async (key: string, ...args: TArgs): Promise<string> => {
      const result = await definition.execute(...args);
      if (result.ok) {
        definition.cache.set(key, result.text);
      }
      metrics.toolCalls.inc({ tool, outcome: 'miss' });
      return result.text;
    },
    {
      logger,
      fallback: describeToolFailure(definition.failureMessage),
      silent: definition.silent,
      onError: () => metrics.toolCalls.inc({ tool, outcome: 'error' }),
    },
  );

  return async (userId: string, ...args: TArgs): Promise<string> => {
    if (!rateLimiter.isAllowed(userId)) {
      metrics.rateLimitRejections.inc({ tool });
      metrics.toolCalls.inc({ tool, outcome: 'rate_limited' });
      logger.warn({ tool, userId }, 'Tool call rejected by rate limiter');
      return RATE_LIMITED_MESSAGE;
    }

    const key = definition.cacheKey(...args);
    const cached = definition.cache.get(key);
    if (cached !== undefined) {
      metrics.toolCalls.inc({ tool, outcome: 'hit' });
      logger.debug({ tool, userId }, 'Tool result served from cache');
      return cached;
    }

    return fetchAndStore(key, ...args);
  };
}
