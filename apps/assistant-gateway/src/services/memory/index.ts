export { InMemoryUserStateStore, formatCoreMemory } from './user-state-store';
export type { UserState, UserStatePatch, UserStateRepository } from './user-state-store';
export { InMemorySummaryStore } from './summary-store';
export { InMemoryVectorMemoryStore } from './vector-memory-store';
