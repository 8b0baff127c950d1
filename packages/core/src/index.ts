export { TtlCache, DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_SECONDS } from './cache/ttl-cache';
export type { TtlCacheOptions, TtlCacheStats } from './cache/ttl-cache';
export { makeCacheKey } from './cache/cache-key';
export {
  RateLimiter,
  DEFAULT_RATE_LIMIT_BLOCK_MS,
  DEFAULT_RATE_LIMIT_MAX_REQUESTS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
} from './rate-limit/rate-limiter';
export type { RateLimiterOptions, RateLimitStatus } from './rate-limit/rate-limiter';
export { SessionRegistry } from './session/session-registry';
export type { SessionHandle } from './session/session-registry';
export {
  MemoryAggregator,
  formatEpisodicMemory,
  DEFAULT_GREETING_INSTRUCTION,
  DEFAULT_HISTORY_FETCH_LIMIT,
  DEFAULT_HISTORY_REPLAY_LIMIT,
  EPISODIC_MEMORY_HEADER,
} from './memory/memory-aggregator';
export type {
  BootstrapContext,
  MemoryAggregatorDependencies,
  MemoryAggregatorOptions,
} from './memory/memory-aggregator';
export { ConversationContext, toReplayableTurn } from './memory/conversation-context';
export type { ConversationRole, ConversationTurn } from './memory/conversation-context';
export type {
  MemoryFilter,
  MemoryRecord,
  SummaryStore,
  UserStateStore,
  VectorMemoryStore,
} from './memory/types';
export { MemoryAggregationError, MalformedMemoryRecordError } from './errors';
export type { MemorySource } from './errors';
export { silentLogger, systemClock } from './logging';
export type { Clock, LoggerLike } from './logging';
