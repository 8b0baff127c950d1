import { MemoryAggregationError, type MemorySource } from '../errors';
import { type LoggerLike, silentLogger } from '../logging';

import { ConversationContext, toReplayableTurn } from './conversation-context';
import type { MemoryRecord, SummaryStore, UserStateStore, VectorMemoryStore } from './types';

export const DEFAULT_HISTORY_FETCH_LIMIT = 30;
export const DEFAULT_HISTORY_REPLAY_LIMIT = 10;

export const DEFAULT_GREETING_INSTRUCTION =
  'User connected. Greet the user by name if you know it, introduce yourself briefly ' +
  'and ask what they would like to work on today. Keep the tone informal.';

export const EPISODIC_MEMORY_HEADER =
  '# EPISODIC MEMORY (LAST SESSION SUMMARY)\n' +
  '[SYSTEM NOTE: Use this to continue the conversation naturally.]';

export interface MemoryAggregatorDependencies {
  userState: UserStateStore;
  summaries: SummaryStore;
  vectorMemory: VectorMemoryStore;
  logger?: LoggerLike;
}

export interface MemoryAggregatorOptions {
  /** Number of history records requested from the vector store. */
  historyFetchLimit?: number;
  /** Number of most recent records replayed into the new conversation. */
  historyReplayLimit?: number;
  greetingInstruction?: string;
}

/** Everything the session runtime needs to open a conversation. */
export interface BootstrapContext {
  initialContext: ConversationContext;
  coreMemory: string;
  episodicMemory: string;
  recentRecords: MemoryRecord[];
}

/**
 * Loads profile, last episodic summary and recent history concurrently and
 * merges them into a bootstrap context. A failure in any source fails the
 * whole load with {@link MemoryAggregationError}.
 */
export class MemoryAggregator {
  private readonly logger: LoggerLike;
  private readonly historyFetchLimit: number;
  private readonly historyReplayLimit: number;
  private readonly greetingInstruction: string;

  constructor(
    private readonly dependencies: MemoryAggregatorDependencies,
    options: MemoryAggregatorOptions = {},
  ) {
    this.logger = dependencies.logger ?? silentLogger;
    this.historyFetchLimit = nonNegativeInteger(
      'historyFetchLimit',
      options.historyFetchLimit ?? DEFAULT_HISTORY_FETCH_LIMIT,
    );
    this.historyReplayLimit = nonNegativeInteger(
      'historyReplayLimit',
      options.historyReplayLimit ?? DEFAULT_HISTORY_REPLAY_LIMIT,
    );
    this.greetingInstruction = options.greetingInstruction ?? DEFAULT_GREETING_INSTRUCTION;
  }

  async load(userId: string): Promise<BootstrapContext> {
    this.logger.info?.({ userId }, 'Loading session memory');

    const { userState, summaries, vectorMemory } = this.dependencies;

    const [coreMemory, lastSummary, recentRecords] = await Promise.all([
      tagFailure(userId, 'profile', () => userState.formatForPrompt(userId)),
      tagFailure(userId, 'summary', () => summaries.getLastSummary(userId)),
      tagFailure(userId, 'history', () =>
        vectorMemory.queryAll({ userId }, this.historyFetchLimit),
      ),
    ]);

    const episodicMemory = formatEpisodicMemory(lastSummary);
    const initialContext = this.buildInitialContext(userId, recentRecords);

    this.logger.info?.(
      {
        userId,
        hasEpisodicMemory: episodicMemory.length > 0,
        recentRecords: recentRecords.length,
        replayedTurns: initialContext.length - 1,
      },
      'Session memory loaded',
    );

    return { initialContext, coreMemory, episodicMemory, recentRecords };
  }

  private buildInitialContext(userId: string, records: MemoryRecord[]): ConversationContext {
    const context = new ConversationContext();

    const replayed = this.historyReplayLimit > 0 ? records.slice(-this.historyReplayLimit) : [];

    for (const record of replayed) {
      try {
        const turn = toReplayableTurn(record);
        if (turn) {
          context.addMessage(turn);
        }
      } catch (error) {
        this.logger.warn?.({ userId, error }, 'Skipping history record that cannot be replayed');
      }
    }

    context.addMessage({ role: 'system', content: this.greetingInstruction });
    return context;
  }
}

/** Wrap a non-empty summary with the continuation header; empty stays empty. */
export function formatEpisodicMemory(summary: string | undefined): string {
  if (!summary) {
    return '';
  }
  return `${EPISODIC_MEMORY_HEADER}\n${summary}`;
}

function nonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`MemoryAggregator ${name} must be a non-negative integer, received ${value}`);
  }
  return value;
}

async function tagFailure<T>(
  userId: string,
  source: MemorySource,
  load: () => Promise<T>,
): Promise<T> {
  try {
    return await load();
  } catch (error) {
    throw new MemoryAggregationError(userId, source, error);
  }
}
