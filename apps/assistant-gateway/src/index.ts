import { resolve } from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { createApplication } from './application';
import { registerShutdown } from './shutdown';
import { createLogger } from './telemetry/logger';

export { createApplication } from './application';
export type { Application, ApplicationOptions } from './application';
export { registerShutdown } from './shutdown';
export type { ShutdownOptions, SignalSource, Stoppable } from './shutdown';

async function main(): Promise<void> {
  const app = await createApplication();
  registerShutdown(app);

  await app.start();
  app.logger.info(
    {
      port: app.config.port,
      proactive: app.config.proactive.enabled,
      rateLimit: app.config.rateLimit.maxRequests,
    },
    'Assistant gateway listening',
  );
}

const entry = process.argv[1];
if (entry && fileURLToPath(import.meta.url) === resolve(entry)) {
  main().catch((error: unknown) => {
    createLogger().fatal({ error }, 'Assistant gateway failed to start');
    process.exitCode = 1;
  });
}
