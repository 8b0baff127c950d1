import { MalformedMemoryRecordError } from '../errors';

import type { MemoryRecord } from './types';

export type ConversationRole = 'system' | 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

/** Ordered list of turns handed to the session runtime when a conversation starts. */
export class ConversationContext {
  private readonly items: ConversationTurn[] = [];

  addMessage(turn: ConversationTurn): void {
    this.items.push({ role: turn.role, content: turn.content });
  }

  get turns(): readonly ConversationTurn[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }
}

/**
 * Convert a stored history record into a replayable turn. Returns `undefined`
 * for records that are well-formed but not replayed (system/tool roles, empty
 * content) and throws {@link MalformedMemoryRecordError} when the record
 * itself has the wrong shape. A missing role is read as `user`.
 */
export function toReplayableTurn(record: MemoryRecord | null | undefined): ConversationTurn | undefined {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw new MalformedMemoryRecordError('Memory record is not an object');
  }

  const role = record.role ?? 'user';
  const content = record.content ?? '';

  if (typeof role !== 'string') {
    throw new MalformedMemoryRecordError(`Memory record role must be a string, received ${typeof role}`);
  }
  if (typeof content !== 'string') {
    throw new MalformedMemoryRecordError(
      `Memory record content must be a string, received ${typeof content}`,
    );
  }

  if ((role !== 'user' && role !== 'assistant') || content.length === 0) {
    return undefined;
  }

  return { role, content };
}
