import type { ConversationTurn } from '@session-governor/core';

/** Produces the episodic summary stored at the end of a session. */
export interface Summarizer {
  summarize(userId: string, turns: readonly ConversationTurn[]): Promise<string | undefined>;
}

export interface ExtractiveSummarizerOptions {
  /** Number of trailing turns kept in the summary. */
  maxTurns?: number;
  maxLength?: number;
}

/**
 * Keeps the last few exchanges verbatim. Stands in for a model-generated
 * summary when no summarisation backend is configured.
 */
export class ExtractiveSummarizer implements Summarizer {
  private readonly maxTurns: number;
  private readonly maxLength: number;

  constructor(options: ExtractiveSummarizerOptions = {}) {
    this.maxTurns = options.maxTurns ?? 6;
    this.maxLength = options.maxLength ?? 600;
  }

  async summarize(_userId: string, turns: readonly ConversationTurn[]): Promise<string | undefined> {
    const lines = turns
      .filter((turn) => turn.role !== 'system')
      .slice(-this.maxTurns)
      .map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`);

    if (lines.length === 0) {
      return undefined;
    }

    const summary = lines.join('\n');
    return summary.length > this.maxLength ? `${summary.slice(0, this.maxLength - 3)}...` : summary;
  }
}
