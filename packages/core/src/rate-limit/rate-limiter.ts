import { type Clock, type LoggerLike, silentLogger, systemClock } from '../logging';

export interface RateLimiterOptions {
  /** Requests admitted per window before the identity is blocked. */
  maxRequests?: number;
  windowMs?: number;
  blockDurationMs?: number;
  /**
   * Number of recent timestamps kept per identity. Must exceed
   * `maxRequests`; older timestamps are dropped silently.
   */
  windowCapacity?: number;
  logger?: LoggerLike;
  clock?: Clock;
}

export type RateLimitStatus =
  | {
      blocked: true;
      blockedUntil: number;
      remainingSeconds: number;
    }
  | {
      blocked: false;
      requestsInWindow: number;
      remainingRequests: number;
    };

export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 10;
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60 * 1000;
export const DEFAULT_RATE_LIMIT_BLOCK_MS = 5 * 60 * 1000;

/**
 * Per-identity sliding-window limiter. Exceeding the threshold inside the
 * window blocks the identity for `blockDurationMs`; while blocked, attempts
 * are rejected without being recorded.
 */
export class RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly blocks = new Map<string, number>();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly blockDurationMs: number;
  private readonly windowCapacity: number;
  private readonly logger: LoggerLike;
  private readonly clock: Clock;
  private lastSweepAt: number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? DEFAULT_RATE_LIMIT_MAX_REQUESTS;
    this.windowMs = options.windowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS;
    this.blockDurationMs = options.blockDurationMs ?? DEFAULT_RATE_LIMIT_BLOCK_MS;
    this.windowCapacity = options.windowCapacity ?? this.maxRequests * 5;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;

    if (!Number.isInteger(this.maxRequests) || this.maxRequests < 1) {
      throw new Error(`RateLimiter maxRequests must be a positive integer, received ${this.maxRequests}`);
    }
    if (!Number.isFinite(this.windowMs) || this.windowMs <= 0) {
      throw new Error(`RateLimiter windowMs must be a positive number, received ${this.windowMs}`);
    }
    if (!Number.isFinite(this.blockDurationMs) || this.blockDurationMs <= 0) {
      throw new Error(
        `RateLimiter blockDurationMs must be a positive number, received ${this.blockDurationMs}`,
      );
    }
    if (!Number.isInteger(this.windowCapacity)) {
      throw new Error(`RateLimiter windowCapacity must be an integer, received ${this.windowCapacity}`);
    }
    if (this.windowCapacity <= this.maxRequests) {
      throw new Error(
        `RateLimiter windowCapacity (${this.windowCapacity}) must exceed maxRequests (${this.maxRequests})`,
      );
    }

    this.lastSweepAt = this.clock();
  }

  /** Number of identities currently holding a window or a block. */
  get trackedIdentities(): number {
    return new Set([...this.windows.keys(), ...this.blocks.keys()]).size;
  }

  isAllowed(identity: string): boolean {
    const now = this.clock();
    this.sweepIdle(now);
    const blockedUntil = this.blocks.get(identity);

    if (blockedUntil !== undefined) {
      if (now < blockedUntil) {
        this.logger.warn?.(
          { identity, blockedUntil: new Date(blockedUntil).toISOString() },
          'Request rejected, identity is blocked',
        );
        return false;
      }
      this.blocks.delete(identity);
      this.logger.info?.({ identity }, 'Rate limit block lifted');
    }

    const windowStart = now - this.windowMs;
    const window = (this.windows.get(identity) ?? []).filter((timestamp) => timestamp > windowStart);
    window.push(now);
    if (window.length > this.windowCapacity) {
      window.splice(0, window.length - this.windowCapacity);
    }
    this.windows.set(identity, window);

    if (this.countRecent(window, now) > this.maxRequests) {
      this.blocks.set(identity, now + this.blockDurationMs);
      this.logger.warn?.(
        { identity, maxRequests: this.maxRequests, blockDurationMs: this.blockDurationMs },
        'Rate limit exceeded, identity blocked',
      );
      return false;
    }

    return true;
  }

  /** Administrative override: forget both the window and any block. */
  reset(identity: string): void {
    this.windows.delete(identity);
    this.blocks.delete(identity);
    this.logger.info?.({ identity }, 'Rate limit reset');
  }

  status(identity: string): RateLimitStatus {
    const now = this.clock();
    const blockedUntil = this.blocks.get(identity);

    if (blockedUntil !== undefined) {
      return {
        blocked: true,
        blockedUntil,
        remainingSeconds: Math.max(0, Math.floor((blockedUntil - now) / 1000)),
      };
    }

    const requestsInWindow = this.countRecent(this.windows.get(identity) ?? [], now);
    return {
      blocked: false,
      requestsInWindow,
      remainingRequests: Math.max(0, this.maxRequests - requestsInWindow),
    };
  }

  clear(): void {
    this.windows.clear();
    this.blocks.clear();
  }

  /**
   * Drops identities with no request inside the window and blocks that have
   * lapsed. Runs at most once per window so a call stays O(1) amortised.
   */
  private sweepIdle(now: number): void {
    if (now - this.lastSweepAt < this.windowMs) {
      return;
    }
    this.lastSweepAt = now;

    for (const [identity, window] of this.windows) {
      if (this.countRecent(window, now) === 0) {
        this.windows.delete(identity);
      }
    }
    for (const [identity, blockedUntil] of this.blocks) {
      if (now >= blockedUntil) {
        this.blocks.delete(identity);
        this.logger.info?.({ identity }, 'Rate limit block lifted');
      }
    }
  }

  private countRecent(window: readonly number[], now: number): number {
    const windowStart = now - this.windowMs;
    return window.filter((timestamp) => timestamp > windowStart).length;
  }
}
