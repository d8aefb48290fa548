/**
 * Token-budgeted conversation memory.
 */

export {
  SUMMARIZE_PROMPT,
  SUMMARY_PREFIX,
  appendTurn,
  buildSummaryMessage,
  formatMessagesForPrompt,
  isSummaryMessage,
  normalizeMemoryConfig,
  updateMemory,
} from './compaction.js';
export { countConversationTokens, estimateTokens, estimatingTokenizer, renderMessage } from './tokens.js';
export type { Tokenizer } from './tokens.js';
export { DEFAULT_FALLBACK_RECENT_MESSAGES, DEFAULT_MAX_CONVERSATION_TOKENS } from './types.js';
export type {
  MemoryAction,
  MemoryConfig,
  MemoryUpdateResult,
  NormalizedMemoryConfig,
  Turn,
} from './types.js';
