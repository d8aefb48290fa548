/**
 * Conversation state threaded through the workflow.
 *
 * Handles state initialization and validation using Zod schemas.
 */

import { z, type ZodType } from 'zod';
import type { ChatMessage } from '../llm/types.js';

/**
 * The unit of work for one request. Each step receives a state and returns
 * a new one; `userInput` never changes after creation.
 */
export interface ConversationState {
  readonly userInput: string;
  intent: string;
  conversationHistory: ChatMessage[];
  finalResponse: string;
}

const toolInvocationSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.string(),
});

export const chatMessageSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('system'), content: z.string() }),
  z.object({ role: z.literal('user'), content: z.string() }),
  z.object({
    role: z.literal('assistant'),
    content: z.string(),
    toolCalls: z.array(toolInvocationSchema).optional(),
  }),
  z.object({
    role: z.literal('tool'),
    content: z.string(),
    toolCallId: z.string(),
    toolName: z.string(),
  }),
]);

export const conversationHistorySchema: ZodType<ChatMessage[]> = z.array(chatMessageSchema);

export const conversationStateSchema: ZodType<ConversationState> = z.object({
  userInput: z.string().min(1),
  intent: z.string(),
  conversationHistory: z.array(chatMessageSchema),
  finalResponse: z.string(),
});

/**
 * Error thrown when state validation fails.
 */
export class StateValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: z.core.$ZodIssue[]
  ) {
    const issueDetails = issues
      .map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
    super(issueDetails ? `${message}: ${issueDetails}` : message);
    this.name = 'StateValidationError';
  }
}

/**
 * Validate state against a Zod schema.
 */
export function validateState<TState>(state: unknown, schema: ZodType<TState>): TState {
  const result = schema.safeParse(state);

  if (!result.success) {
    throw new StateValidationError('State validation failed', result.error.issues);
  }

  return result.data;
}

/**
 * Build the state a request starts from. The history is copied so the
 * caller's array is never mutated by the pipeline.
 */
export function createInitialState(
  userInput: string,
  conversationHistory: readonly ChatMessage[] = []
): ConversationState {
  return {
    userInput,
    intent: '',
    conversationHistory: [...conversationHistory],
    finalResponse: '',
  };
}

/**
 * Merge partial state updates into existing state.
 */
export function mergeState<TState extends object>(
  currentState: TState,
  updates: Partial<TState>
): TState {
  return {
    ...currentState,
    ...updates,
  };
}
