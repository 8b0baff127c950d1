import type { RateLimiter } from '@session-governor/core';

import { AdminAuthError } from '../errors';
import { verifyAdminToken } from '../server/admin-auth';
import type { GatewayFastifyInstance } from '../server/types';
import { describeToolCaches, type ToolCacheName, type ToolCaches } from '../services/tools';

export interface AdminRouteContext {
  token: string;
  rateLimiter: RateLimiter;
  caches: ToolCaches;
}

interface UserParams {
  userId: string;
}

/**
 * Operator endpoints for inspecting and resetting governance state. Every
 * route under `/admin` requires the configured bearer token.
 */
export async function registerAdminRoutes(
  app: GatewayFastifyInstance,
  context: AdminRouteContext,
): Promise<void> {
  await app.register(
    async (admin) => {
      admin.addHook('onRequest', async (request) => {
        if (!verifyAdminToken(context.token, request.headers.authorization)) {
          throw new AdminAuthError();
        }
      });

      admin.get<{ Params: UserParams }>('/rate-limits/:userId', async (request) => {
        const { userId } = request.params;
        return { userId, ...context.rateLimiter.status(userId) };
      });

      admin.delete<{ Params: UserParams }>('/rate-limits/:userId', async (request) => {
        const { userId } = request.params;
        context.rateLimiter.reset(userId);
        request.log.info({ userId }, 'Rate limit state reset by operator');
        return { userId, reset: true };
      });

      admin.get('/cache', async () => ({ caches: describeToolCaches(context.caches) }));

      admin.delete('/cache', async (request) => {
        const cleared: ToolCacheName[] = ['cryptoPrice', 'weather', 'webSearch'];
        for (const name of cleared) {
          context.caches[name].clear();
        }
        request.log.info({ cleared }, 'Tool caches cleared by operator');
        return { cleared };
      });
    },
    { prefix: '/admin' },
  );
}
