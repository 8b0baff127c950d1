import type { GatewayFastifyInstance } from '../server/types';

export interface HealthRouteContext {
  /** Number of live sessions, reported for quick operational checks. */
  activeSessions: () => number;
}

/** Register the liveness endpoint (`/healthz`). */
export async function registerHealthRoutes(
  app: GatewayFastifyInstance,
  context: HealthRouteContext,
): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok', activeSessions: context.activeSessions() }));
}
