import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

import { RateLimitExceededError } from '../errors';

/**
 * Translate known error shapes into HTTP status codes. Anything without a
 * numeric `statusCode` is a 500.
 */
export function inferStatusCode(error: unknown): number {
  if (error && typeof error === 'object' && 'statusCode' in error) {
    const status = error.statusCode;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }

  return 500;
}

export async function handleHttpError(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply> {
  const statusCode = inferStatusCode(error);

  if (statusCode >= 500) {
    request.log.error({ error }, 'Request failed');
  } else {
    request.log.warn({ error: error.message, statusCode }, 'Request rejected');
  }

  if (error instanceof RateLimitExceededError && error.retryAfterSeconds !== undefined) {
    void reply.header('retry-after', String(error.retryAfterSeconds));
  }

  return reply.code(statusCode).send({
    error: error.name,
    message: statusCode >= 500 ? 'Internal Server Error' : error.message,
  });
}
