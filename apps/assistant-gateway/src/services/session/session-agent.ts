import type { ConversationContext, SessionRegistry } from '@session-governor/core';

/** Live conversation endpoint owned by the session runtime. */
export interface SessionAgent {
  /** Push an agent-initiated message into the running conversation. */
  deliver(message: string): Promise<void>;
}

export type AssistantSessionRegistry = SessionRegistry<ConversationContext, SessionAgent>;
