/**
 * Tool-augmented response generation.
 *
 * At most two model rounds: the first may request tools, the tools run one
 * after another, and the second round answers from their results with no
 * tools offered. Any failure yields FALLBACK_RESPONSE instead of an error.
 */

import type { ChatMessage, ChatModel } from '../llm/types.js';
import { replyText } from '../llm/types.js';
import type { ToolRegistry } from '../core/registry.js';
import {
  buildSystemPrompt,
  DEFAULT_DESTINATION,
  FALLBACK_RESPONSE,
  intentHint,
  type Destination,
  type HintToolIds,
} from './prompts.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const logger = createLogger({ name: 'responder' });

export interface ResponderConfig {
  model: ChatModel;
  registry: ToolRegistry;
  destination?: Destination | undefined;
  /** Tool names the intent hints refer to */
  hintToolIds?: HintToolIds | undefined;
}

export interface ResponderInput {
  userInput: string;
  intent: string;
  conversationHistory: readonly ChatMessage[];
}

/**
 * Messages for the first round: system instruction with the intent hint,
 * the prior history, then the current input.
 */
export function buildResponderMessages(
  input: ResponderInput,
  destination: Destination = DEFAULT_DESTINATION,
  hintToolIds?: HintToolIds
): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(destination, intentHint(input.intent, hintToolIds)) },
    ...input.conversationHistory,
    { role: 'user', content: input.userInput },
  ];
}

async function runRounds(config: ResponderConfig, messages: ChatMessage[]): Promise<string> {
  const first = await config.model.complete({
    messages,
    tools: config.registry.descriptors(),
    toolChoice: 'auto',
  });

  if (first.type === 'text') {
    return first.text;
  }

  messages.push({ role: 'assistant', content: first.text ?? '', toolCalls: first.toolCalls });

  for (const call of first.toolCalls) {
    const result = await config.registry.dispatch(call);
    messages.push({ role: 'tool', content: result, toolCallId: call.id, toolName: call.name });
  }

  logger.debug('Tool round finished', { tools: first.toolCalls.map((call) => call.name) });

  const second = await config.model.complete({ messages });
  return replyText(second);
}

/**
 * Produce the final answer for one request.
 */
export async function generateResponse(
  config: ResponderConfig,
  input: ResponderInput
): Promise<string> {
  const messages = buildResponderMessages(input, config.destination, config.hintToolIds);

  try {
    const answer = await runRounds(config, messages);
    if (!answer.trim()) {
      throw new Error('Model returned an empty answer');
    }
    return answer;
  } catch (err) {
    logger.error('Agent error', { intent: input.intent, error: errorMessage(err) });
    return FALLBACK_RESPONSE;
  }
}
