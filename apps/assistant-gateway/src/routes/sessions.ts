import type { RateLimiter } from '@session-governor/core';
import { z } from 'zod';

import { InvalidRequestError, RateLimitExceededError, SessionNotFoundError } from '../errors';
import type { GatewayFastifyInstance } from '../server/types';
import type { AssistantSessionRegistry } from '../services/session';

export interface SessionRouteContext {
  registry: AssistantSessionRegistry;
  rateLimiter: RateLimiter;
}

const messageBodySchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty').max(2000, 'text is too long'),
});

interface UserParams {
  userId: string;
}

/**
 * Register the session directory routes: listing live sessions and pushing
 * an agent-initiated message into one of them.
 */
export async function registerSessionRoutes(
  app: GatewayFastifyInstance,
  context: SessionRouteContext,
): Promise<void> {
  app.get('/sessions', async () => ({
    sessions: [...context.registry.listActive()].sort(),
  }));

  app.post<{ Params: UserParams; Body: unknown }>('/sessions/:userId/messages', async (request, reply) => {
    const { userId } = request.params;
    const parsed = messageBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new InvalidRequestError(parsed.error.issues[0]?.message ?? 'Invalid message body');
    }

    const agent = context.registry.getAgent(userId);
    if (!agent) {
      throw new SessionNotFoundError(userId);
    }

    if (!context.rateLimiter.isAllowed(userId)) {
      const status = context.rateLimiter.status(userId);
      throw new RateLimitExceededError(userId, status.blocked ? status.remainingSeconds : undefined);
    }

    await agent.deliver(parsed.data.text);
    request.log.info({ userId }, 'Message delivered to live session');

    return reply.code(202).send({ status: 'delivered', userId });
  });
}
