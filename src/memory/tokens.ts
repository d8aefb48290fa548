/**
 * Token counting for the conversation budget.
 *
 * The default tokenizer uses a simple heuristic: ~4 characters per token.
 * Counts only drive budget comparisons, so an estimate is enough; pass a
 * model-specific Tokenizer for exact figures.
 */

import type { ChatMessage } from '../llm/types.js';

export interface Tokenizer {
  countTokens(text: string): number;
}

/**
 * Estimate token count for a string using the ~4 chars/token heuristic.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export const estimatingTokenizer: Tokenizer = {
  countTokens: estimateTokens,
};

/** The line a message contributes to budgets and summary prompts. */
export function renderMessage(message: ChatMessage): string {
  return `${message.role}: ${message.content}`;
}

/**
 * Total tokens of a history, counting `"{role}: {content}"` per message.
 */
export function countConversationTokens(
  messages: readonly ChatMessage[],
  tokenizer: Tokenizer = estimatingTokenizer
): number {
  let total = 0;
  for (const message of messages) {
    total += tokenizer.countTokens(renderMessage(message));
  }
  return total;
}
