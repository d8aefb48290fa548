/**
 * Terminal chat loop, kept apart from the entry point so it runs against
 * any line source.
 */

import type { TravelAssistant } from './agents/assistant.js';
import { createLogger, errorMessage } from './utils/logger.js';

const logger = createLogger({ name: 'cli' });

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);

/** Shown in place of a failed turn; the cause goes to the log. */
export const TURN_ERROR_LINE = 'Error: Sorry, something went wrong. Please try again.';

export interface ChatIO {
  /** Resolves with the next line; rejects when input is closed */
  ask(prompt: string): Promise<string>;
  print(line: string): void;
}

/**
 * Read lines until an exit command or end of input, sending each non-empty
 * line to the assistant under one session.
 */
export async function runChat(
  io: ChatIO,
  assistant: Pick<TravelAssistant, 'chat'>,
  sessionId: string
): Promise<void> {
  while (true) {
    let userInput: string;
    try {
      userInput = (await io.ask('You: ')).trim();
    } catch {
      // Ctrl+D / closed stdin
      io.print('\nGoodbye!');
      return;
    }

    if (EXIT_COMMANDS.has(userInput.toLowerCase())) {
      io.print('Goodbye!');
      return;
    }

    if (!userInput) continue;

    try {
      const response = await assistant.chat({ message: userInput, sessionId });
      io.print(`Assistant: ${response.message}`);
    } catch (err) {
      logger.error('Chat turn failed', { sessionId, error: errorMessage(err) });
      io.print(TURN_ERROR_LINE);
    }
    io.print('');
  }
}
