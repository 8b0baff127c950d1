import {
  ConversationContext,
  DEFAULT_GREETING_INSTRUCTION,
  MemoryAggregationError,
  type BootstrapContext,
  type ConversationTurn,
  type MemoryAggregator,
  type SummaryStore,
  type VectorMemoryStore,
} from '@session-governor/core';

import type { MemoryLoadFailurePolicy } from '../../config';
import { SessionStartError } from '../../errors';
import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';

import type { AssistantSessionRegistry, SessionAgent } from './session-agent';
import type { Summarizer } from './summarizer';

/** Assistant turns with this prefix are tool notes, not conversation. */
const SYSTEM_NOTE_PREFIX = '[SYSTEM';

export interface SessionStores {
  summaries: SummaryStore;
  vectorMemory: VectorMemoryStore;
}

export interface SessionLifecycleOptions {
  failurePolicy: MemoryLoadFailurePolicy;
  greetingInstruction?: string;
}

/**
 * Opens and closes assistant sessions: memory is aggregated and the session
 * registered on start; on end the session is unregistered and the transcript
 * and its summary are persisted.
 */
export class SessionLifecycleService {
  constructor(
    private readonly aggregator: MemoryAggregator,
    private readonly registry: AssistantSessionRegistry,
    private readonly stores: SessionStores,
    private readonly summarizer: Summarizer,
    private readonly metrics: GatewayMetrics,
    private readonly logger: AppLogger,
    private readonly options: SessionLifecycleOptions,
  ) {}

  async startSession(userId: string, agent: SessionAgent): Promise<BootstrapContext> {
    let bootstrap: BootstrapContext;

    try {
      bootstrap = await this.aggregator.load(userId);
    } catch (error) {
      bootstrap = this.recoverFromLoadFailure(userId, error);
    }

    this.registry.register(userId, {
      userId,
      contextRef: bootstrap.initialContext,
      agentRef: agent,
    });
    this.metrics.activeSessions.set(this.registry.size);

    return bootstrap;
  }

  async endSession(userId: string, transcript: readonly ConversationTurn[]): Promise<void> {
    const removed = this.registry.unregister(userId);
    this.metrics.activeSessions.set(this.registry.size);
    if (!removed) {
      this.logger.debug({ userId }, 'Ending a session that was not registered');
    }

    const turns = transcript.filter(isPersistable);
    if (turns.length === 0) {
      this.logger.info({ userId }, 'No conversation to persist');
      return;
    }

    try {
      await this.stores.vectorMemory.add(
        userId,
        turns.map(({ role, content }) => ({ role, content })),
      );
    } catch (error) {
      this.logger.error({ userId, error }, 'Failed to persist session transcript');
    }

    try {
      const summary = await this.summarizer.summarize(userId, turns);
      if (summary) {
        await this.stores.summaries.addSummary(userId, summary);
        this.logger.info({ userId, length: summary.length }, 'Session summary saved');
      }
    } catch (error) {
      this.logger.error({ userId, error }, 'Failed to save session summary');
    }
  }

  private recoverFromLoadFailure(userId: string, error: unknown): BootstrapContext {
    const source = error instanceof MemoryAggregationError ? error.source : 'unknown';
    this.metrics.memoryLoadFailures.inc({ source });

    if (this.options.failurePolicy === 'abort') {
      this.logger.error({ userId, source, error }, 'Memory load failed, refusing to start session');
      throw new SessionStartError(`Could not load memory for user ${userId}`, error);
    }

    this.logger.warn({ userId, source, error }, 'Memory load failed, starting with greeting only');

    const initialContext = new ConversationContext();
    initialContext.addMessage({
      role: 'system',
      content: this.options.greetingInstruction ?? DEFAULT_GREETING_INSTRUCTION,
    });

    return { initialContext, coreMemory: '', episodicMemory: '', recentRecords: [] };
  }
}

function isPersistable(turn: ConversationTurn): boolean {
  if (turn.content.trim().length === 0) {
    return false;
  }
  if (turn.role === 'user') {
    return true;
  }
  return turn.role === 'assistant' && !turn.content.startsWith(SYSTEM_NOTE_PREFIX);
}
