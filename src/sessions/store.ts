/**
 * Session store: `sessionId -> conversation history`.
 *
 * Read once at the start of a request and written once at the end, with no
 * lock held in between. Two concurrent requests on one session therefore race
 * and the later write wins.
 */

import type { ChatMessage } from '../llm/types.js';

export interface SessionStore {
  /** History for a session; an unknown id yields an empty history. */
  get(sessionId: string): Promise<ChatMessage[]>;
  put(sessionId: string, history: readonly ChatMessage[]): Promise<void>;
  /** Remove a session. Resolves to whether it existed. */
  delete(sessionId: string): Promise<boolean>;
}

function cloneMessage(message: ChatMessage): ChatMessage {
  if (message.role === 'assistant' && message.toolCalls) {
    return { ...message, toolCalls: message.toolCalls.map((call) => ({ ...call })) };
  }
  return { ...message };
}

function cloneHistory(history: readonly ChatMessage[]): ChatMessage[] {
  return history.map(cloneMessage);
}

/**
 * Process-local store. Histories are copied on the way in and out so no two
 * requests ever hold the same array.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ChatMessage[]>();

  async get(sessionId: string): Promise<ChatMessage[]> {
    const history = this.sessions.get(sessionId);
    return history ? cloneHistory(history) : [];
  }

  async put(sessionId: string, history: readonly ChatMessage[]): Promise<void> {
    this.sessions.set(sessionId, cloneHistory(history));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }
}
