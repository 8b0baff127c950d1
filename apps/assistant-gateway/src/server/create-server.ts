import helmet from '@fastify/helmet';
import type { RateLimiter } from '@session-governor/core';
import Fastify from 'fastify';

import type { AppConfig } from '../config';
import { registerAdminRoutes } from '../routes/admin';
import { registerHealthRoutes } from '../routes/health';
import { registerSessionRoutes } from '../routes/sessions';
import type { AssistantSessionRegistry } from '../services/session';
import type { ToolCaches } from '../services/tools';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';

import { handleHttpError } from './http-errors';
import type { GatewayFastifyInstance } from './types';

export type { GatewayFastifyInstance } from './types';

export interface ServerOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  registry: AssistantSessionRegistry;
  rateLimiter: RateLimiter;
  caches: ToolCaches;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Build the Fastify server exposing health, metrics, the session directory
 * and (when an admin token is configured) the governance admin routes, with
 * helmet and correlation IDs applied to every request.
 */
export async function createServer(options: ServerOptions): Promise<GatewayFastifyInstance> {
  const app = Fastify({
    logger: options.logger,
    disableRequestLogging: options.config.env === 'production',
  });

  await app.register(helmet, {
    global: true,
  });

  app.setErrorHandler(handleHttpError);

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId =
      firstHeader(request.headers['x-request-id']) ??
      firstHeader(request.headers['x-correlation-id']) ??
      request.id;

    void reply.header('x-request-id', correlationId);
    request.headers['x-correlation-id'] = correlationId;
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    const labels = {
      route: request.routeOptions.url ?? 'unmatched',
      status: String(reply.statusCode),
    };
    options.metrics.requestCounter.inc(labels);
    options.metrics.requestDuration.observe(labels, reply.elapsedTime / 1000);

    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  await registerHealthRoutes(app, { activeSessions: () => options.registry.size });
  await registerSessionRoutes(app, {
    registry: options.registry,
    rateLimiter: options.rateLimiter,
  });

  if (options.config.adminToken) {
    await registerAdminRoutes(app, {
      token: options.config.adminToken,
      rateLimiter: options.rateLimiter,
      caches: options.caches,
    });
  } else {
    options.logger.info('ADMIN_API_TOKEN not set, admin routes disabled');
  }

  app.get('/metrics', async (_, reply) => {
    const payload = await options.metrics.registry.metrics();
    return reply.type(options.metrics.registry.contentType).send(payload);
  });

  return app as GatewayFastifyInstance;
}
