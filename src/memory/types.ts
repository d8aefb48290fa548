/**
 * Types for the token-budgeted conversation memory.
 *
 * When a history grows past the budget it is replaced wholesale by a single
 * summary message; if summarizing fails, only the most recent messages are kept.
 */

import type { ChatMessage, ChatModel } from '../llm/types.js';
import type { Tokenizer } from './tokens.js';

export const DEFAULT_MAX_CONVERSATION_TOKENS = 12_000;
export const DEFAULT_FALLBACK_RECENT_MESSAGES = 10;

/**
 * User-facing memory configuration.
 */
export interface MemoryConfig {
  /** Model used to write summaries */
  summaryModel: ChatModel;
  /** Maximum total history tokens before summarization triggers (default: 12000) */
  maxConversationTokens?: number | undefined;
  /** Messages kept when summarization fails (default: 10) */
  fallbackRecentMessages?: number | undefined;
  /** Token counter (default: ~4 characters per token) */
  tokenizer?: Tokenizer | undefined;
}

/**
 * Internal: all fields resolved to concrete values.
 */
export interface NormalizedMemoryConfig {
  summaryModel: ChatModel;
  maxConversationTokens: number;
  fallbackRecentMessages: number;
  tokenizer: Tokenizer;
}

/** The two messages a turn adds to the history. */
export interface Turn {
  userInput: string;
  finalResponse: string;
}

export type MemoryAction = 'none' | 'summarized' | 'truncated';

/**
 * Result from updateMemory.
 */
export interface MemoryUpdateResult {
  /** What the budget policy did after appending the turn */
  action: MemoryAction;
  /** The history to persist */
  messages: ChatMessage[];
  /** Tokens right after the turn was appended */
  tokensBefore: number;
  /** Tokens of the history to persist */
  tokensAfter: number;
}
