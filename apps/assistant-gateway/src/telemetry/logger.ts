import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
}

/** Header paths that must never reach log output. */
const REDACTED_PATHS = ['req.headers.authorization', 'headers.authorization'];

/**
 * Create the gateway's Pino logger. Admin bearer tokens are redacted from
 * request logs; everything else is logged as structured JSON.
 */
export function createLogger(config: LoggerConfig = {}): AppLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'assistant-gateway',
    level: config.level ?? inferDefaultLevel(),
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  return pino(options);
}

/** Derive a child logger for one governance component, e.g. `rate-limiter`. */
export function componentLogger(logger: AppLogger, component: string): AppLogger {
  return logger.child({ component });
}

function inferDefaultLevel(): string {
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}
