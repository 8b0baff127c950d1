import type { Clock, SummaryStore } from '@session-governor/core';

interface StoredSummary {
  text: string;
  createdAt: number;
}

/** Keeps every session summary per user; the latest one is served back. */
export class InMemorySummaryStore implements SummaryStore {
  private readonly summaries = new Map<string, StoredSummary[]>();

  constructor(private readonly clock: Clock = () => Date.now()) {}

  async getLastSummary(userId: string): Promise<string | undefined> {
    const history = this.summaries.get(userId);
    if (!history || history.length === 0) {
      return undefined;
    }
    return history[history.length - 1].text;
  }

  async addSummary(userId: string, text: string): Promise<void> {
    const trimmed = text.trim();
    if (!trimmed) {
      return;
    }

    const history = this.summaries.get(userId) ?? [];
    history.push({ text: trimmed, createdAt: this.clock() });
    this.summaries.set(userId, history);
  }
}
