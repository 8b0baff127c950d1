import { type LoggerLike, silentLogger } from '../logging';

/**
 * Association between a user and the live conversation objects owned by the
 * session runtime. The registry stores it verbatim and never calls into it.
 */
export interface SessionHandle<TContext = unknown, TAgent = unknown> {
  userId: string;
  contextRef: TContext;
  agentRef: TAgent;
}

/**
 * Directory of active sessions keyed by user identity, used by actors such
 * as the proactive scheduler to reach a live conversation. Lifetime is driven
 * by the runtime: it registers once at start and unregisters once at end. A
 * second registration for the same user replaces the first.
 */
export class SessionRegistry<TContext = unknown, TAgent = unknown> {
  private readonly sessions = new Map<string, SessionHandle<TContext, TAgent>>();

  constructor(private readonly logger: LoggerLike = silentLogger) {}

  register(userId: string, handle: SessionHandle<TContext, TAgent>): void {
    const replaced = this.sessions.has(userId);
    this.sessions.set(userId, handle);
    this.logger.info?.({ userId, replaced }, 'Session registered');
  }

  unregister(userId: string): boolean {
    const removed = this.sessions.delete(userId);
    if (removed) {
      this.logger.info?.({ userId }, 'Session unregistered');
    }
    return removed;
  }

  get(userId: string): SessionHandle<TContext, TAgent> | undefined {
    return this.sessions.get(userId);
  }

  getContext(userId: string): TContext | undefined {
    return this.sessions.get(userId)?.contextRef;
  }

  getAgent(userId: string): TAgent | undefined {
    return this.sessions.get(userId)?.agentRef;
  }

  isActive(userId: string): boolean {
    return this.sessions.has(userId);
  }

  listActive(): ReadonlySet<string> {
    return new Set(this.sessions.keys());
  }

  get size(): number {
    return this.sessions.size;
  }

  clear(): void {
    this.sessions.clear();
    this.logger.info?.('All sessions cleared from registry');
  }
}
