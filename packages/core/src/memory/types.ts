/** Record returned by the vector memory store; shape is not guaranteed. */
export interface MemoryRecord {
  role?: unknown;
  content?: unknown;
  [key: string]: unknown;
}

export interface MemoryFilter {
  userId: string;
}

/** Long-lived profile ("core memory") of a user. */
export interface UserStateStore {
  formatForPrompt(userId: string): Promise<string>;
}

/** Episodic memory: one condensed summary per finished session. */
export interface SummaryStore {
  getLastSummary(userId: string): Promise<string | undefined>;
  addSummary(userId: string, text: string): Promise<void>;
}

/** Conversation history persisted between sessions. */
export interface VectorMemoryStore {
  queryAll(filter: MemoryFilter, limit: number): Promise<MemoryRecord[]>;
  add(userId: string, records: ReadonlyArray<{ role: string; content: string }>): Promise<void>;
}
