/**
 * Minimal logging contract used by the governance primitives. A pino logger
 * or a console-like object satisfies this interface out of the box.
 */
export interface LoggerLike {
  debug?(payload?: unknown, message?: string): void;
  info?(payload?: unknown, message?: string): void;
  warn?(payload?: unknown, message?: string): void;
  error?(payload?: unknown, message?: string): void;
}

/** Logger used when a caller does not provide one. */
export const silentLogger: LoggerLike = {};

/** Source of the current time in epoch milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
