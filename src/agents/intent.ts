/**
 * Intent classification: one model call, no history, bare label out.
 */

import type { ChatModel } from '../llm/types.js';
import { replyText } from '../llm/types.js';
import { buildIntentPrompt, DEFAULT_DESTINATION, type Destination } from './prompts.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ name: 'intent' });

/**
 * Classify the user's input. The trimmed reply is returned as-is, so an
 * unexpected label flows through and only means an empty hint later.
 * Model errors propagate.
 */
export async function classifyIntent(
  model: ChatModel,
  userInput: string,
  destination: Destination = DEFAULT_DESTINATION
): Promise<string> {
  const reply = await model.complete({
    messages: [
      { role: 'system', content: buildIntentPrompt(destination) },
      { role: 'user', content: userInput },
    ],
  });

  const intent = replyText(reply).trim();
  logger.debug('Intent classified', { intent });
  return intent;
}
