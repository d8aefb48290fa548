/**
 * Conversation memory update with token-budgeted summarization.
 *
 * Appends the finished turn, then, if the history is over budget, replaces
 * the whole history with one summary message written by the model. A failed
 * summarization falls back to keeping only the most recent messages.
 */

import type { ChatMessage, SystemMessage } from '../llm/types.js';
import type { MemoryConfig, MemoryUpdateResult, NormalizedMemoryConfig, Turn } from './types.js';
import { DEFAULT_FALLBACK_RECENT_MESSAGES, DEFAULT_MAX_CONVERSATION_TOKENS } from './types.js';
import { countConversationTokens, estimatingTokenizer, renderMessage } from './tokens.js';
import { replyText } from '../llm/types.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const logger = createLogger({ name: 'memory' });

// ── Constants ────────────────────────────────────────────────────────

export const SUMMARIZE_PROMPT = `Summarize this conversation, keep it concise and to the point (essentials).
{conversation_text}

Summary:`;

export const SUMMARY_PREFIX = 'Previous conversation summary: ';

// ── Helpers ──────────────────────────────────────────────────────────

export function normalizeMemoryConfig(config: MemoryConfig): NormalizedMemoryConfig {
  const maxConversationTokens = config.maxConversationTokens ?? DEFAULT_MAX_CONVERSATION_TOKENS;
  const fallbackRecentMessages = config.fallbackRecentMessages ?? DEFAULT_FALLBACK_RECENT_MESSAGES;

  if (!Number.isInteger(maxConversationTokens) || maxConversationTokens <= 0) {
    throw new RangeError(
      `maxConversationTokens must be a positive integer, got ${String(maxConversationTokens)}`
    );
  }
  if (!Number.isInteger(fallbackRecentMessages) || fallbackRecentMessages <= 0) {
    throw new RangeError(
      `fallbackRecentMessages must be a positive integer, got ${String(fallbackRecentMessages)}`
    );
  }

  return {
    summaryModel: config.summaryModel,
    maxConversationTokens,
    fallbackRecentMessages,
    tokenizer: config.tokenizer ?? estimatingTokenizer,
  };
}

/**
 * The system message that stands in for a summarized history.
 */
export function buildSummaryMessage(summary: string): SystemMessage {
  return { role: 'system', content: SUMMARY_PREFIX + summary };
}

export function isSummaryMessage(message: ChatMessage): boolean {
  return message.role === 'system' && message.content.startsWith(SUMMARY_PREFIX);
}

/**
 * Return a new history with the turn's user and assistant messages appended.
 */
export function appendTurn(history: readonly ChatMessage[], turn: Turn): ChatMessage[] {
  return [
    ...history,
    { role: 'user', content: turn.userInput },
    { role: 'assistant', content: turn.finalResponse },
  ];
}

/**
 * Format messages as one `"{role}: {content}"` line each.
 */
export function formatMessagesForPrompt(messages: readonly ChatMessage[]): string {
  return messages.map(renderMessage).join('\n');
}

async function summarize(
  messages: readonly ChatMessage[],
  config: NormalizedMemoryConfig
): Promise<string> {
  const conversationText = formatMessagesForPrompt(messages);
  const prompt = SUMMARIZE_PROMPT.replace('{conversation_text}', () => conversationText);
  const reply = await config.summaryModel.complete({
    messages: [{ role: 'user', content: prompt }],
  });

  const summary = replyText(reply).trim();
  if (!summary) {
    throw new Error('Summarization returned no text');
  }
  return summary;
}

// ── Main function ────────────────────────────────────────────────────

/**
 * Append a turn and enforce the token budget.
 *
 * 1. Append the user message and the assistant response
 * 2. If total tokens <= maxConversationTokens -> keep as-is
 * 3. Otherwise ask the model to summarize the whole history and replace it
 *    with a single system message carrying the summary
 * 4. If summarization fails -> keep the last fallbackRecentMessages messages
 */
export async function updateMemory(
  history: readonly ChatMessage[],
  turn: Turn,
  config: NormalizedMemoryConfig
): Promise<MemoryUpdateResult> {
  const messages = appendTurn(history, turn);
  const tokensBefore = countConversationTokens(messages, config.tokenizer);

  if (tokensBefore <= config.maxConversationTokens) {
    return { action: 'none', messages, tokensBefore, tokensAfter: tokensBefore };
  }

  logger.info('Summarizing conversation', {
    tokens: tokensBefore,
    limit: config.maxConversationTokens,
    messages: messages.length,
  });

  try {
    const summarized = [buildSummaryMessage(await summarize(messages, config))];
    const tokensAfter = countConversationTokens(summarized, config.tokenizer);

    logger.info('Conversation compressed', { from: tokensBefore, to: tokensAfter });
    return { action: 'summarized', messages: summarized, tokensBefore, tokensAfter };
  } catch (err) {
    logger.error('Summarization failed', { error: errorMessage(err) });

    const truncated = messages.slice(-config.fallbackRecentMessages);
    logger.warn('Falling back to the most recent messages', { kept: truncated.length });
    return {
      action: 'truncated',
      messages: truncated,
      tokensBefore,
      tokensAfter: countConversationTokens(truncated, config.tokenizer),
    };
  }
}
