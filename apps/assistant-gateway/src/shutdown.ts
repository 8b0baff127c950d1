import process from 'node:process';

import type { AppLogger } from './telemetry/logger';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

export interface Stoppable {
  logger: AppLogger;
  stop(): Promise<void>;
}

/** Anything signals can be subscribed on; `process` in production. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownOptions {
  signals?: readonly NodeJS.Signals[];
  source?: SignalSource;
  exit?: (code: number) => void;
  /** Upper bound on `stop()` before the process is forced down. */
  timeoutMs?: number;
}

/**
 * Stop the application once on the first termination signal, then exit.
 * Later signals while draining are logged and ignored. Exits with 1 when
 * `stop()` fails or outlives the timeout.
 */
export function registerShutdown(
  app: Stoppable,
  options: ShutdownOptions = {},
): (signal: NodeJS.Signals) => Promise<void> {
  const {
    signals = SHUTDOWN_SIGNALS,
    source = process,
    exit = (code: number) => process.exit(code),
    timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS,
  } = options;

  let draining: Promise<void> | undefined;

  const drain = async (signal: NodeJS.Signals): Promise<void> => {
    app.logger.info({ signal, timeoutMs }, 'Shutting down assistant gateway');

    const deadline = setTimeout(() => {
      app.logger.error({ timeoutMs }, 'Shutdown timed out, forcing exit');
      exit(1);
    }, timeoutMs);
    deadline.unref();

    let code = 0;
    try {
      await app.stop();
      app.logger.info('Shutdown complete');
    } catch (error) {
      code = 1;
      app.logger.error({ error }, 'Error during shutdown');
    } finally {
      clearTimeout(deadline);
    }
    exit(code);
  };

  const shutdown = (signal: NodeJS.Signals): Promise<void> => {
    if (draining) {
      app.logger.warn({ signal }, 'Shutdown already in progress');
      return draining;
    }
    draining = drain(signal);
    return draining;
  };

  for (const signal of signals) {
    source.on(signal, () => {
      void shutdown(signal);
    });
  }

  return shutdown;
}
