/** Memory sources consulted when a conversation starts. */
export type MemorySource = 'profile' | 'summary' | 'history';

/**
 * Raised when any of the memory sources fails while bootstrapping a session.
 * The aggregation is all-or-nothing; callers decide whether to continue with
 * an empty context.
 */
export class MemoryAggregationError extends Error {
  constructor(
    public readonly userId: string,
    public readonly source: MemorySource,
    public readonly cause?: unknown,
  ) {
    super(`Could not load memory for user ${userId} (${source} source failed)`);
    this.name = 'MemoryAggregationError';
  }
}

/** Raised for a history record whose shape cannot be replayed into a conversation. */
export class MalformedMemoryRecordError extends Error {
  constructor(message = 'Malformed memory record') {
    super(message);
    this.name = 'MalformedMemoryRecordError';
  }
}
