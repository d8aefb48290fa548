/**
 * The travel assistant: a three-step workflow over ConversationState and the
 * request handler that reads and writes session history around it.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ChatMessage, ChatModel } from '../llm/types.js';
import type { Tool } from '../core/tool.js';
import { ToolRegistry } from '../core/registry.js';
import {
  conversationStateSchema,
  createInitialState,
  mergeState,
  type ConversationState,
} from '../core/state.js';
import { defineWorkflow, type Workflow } from '../core/workflow.js';
import { normalizeMemoryConfig, updateMemory } from '../memory/compaction.js';
import type { MemoryConfig, NormalizedMemoryConfig } from '../memory/types.js';
import { InMemorySessionStore, type SessionStore } from '../sessions/store.js';
import { classifyIntent } from './intent.js';
import { generateResponse } from './responder.js';
import { DEFAULT_DESTINATION, type Destination, type HintToolIds } from './prompts.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ name: 'assistant' });

export const WORKFLOW_ID = 'travel_assistant';
export const MAX_MESSAGE_LENGTH = 1000;

// ── Workflow ─────────────────────────────────────────────────────────

export interface AssistantWorkflowConfig {
  model: ChatModel;
  registry: ToolRegistry;
  memory: NormalizedMemoryConfig;
  destination?: Destination | undefined;
  hintToolIds?: HintToolIds | undefined;
}

/**
 * classify_intent → smart_agent → update_memory.
 */
export function createAssistantWorkflow(
  config: AssistantWorkflowConfig
): Workflow<ConversationState> {
  const destination = config.destination ?? DEFAULT_DESTINATION;

  return defineWorkflow<ConversationState>({
    id: WORKFLOW_ID,
    description: `Answers ${destination.city} travel questions with search and weather tools`,
    stateSchema: conversationStateSchema,
    steps: [
      {
        id: 'classify_intent',
        run: async (state) =>
          mergeState(state, {
            intent: await classifyIntent(config.model, state.userInput, destination),
          }),
      },
      {
        id: 'smart_agent',
        run: async (state) =>
          mergeState(state, {
            finalResponse: await generateResponse(
              {
                model: config.model,
                registry: config.registry,
                destination,
                hintToolIds: config.hintToolIds,
              },
              state
            ),
          }),
      },
      {
        id: 'update_memory',
        run: async (state) => {
          const result = await updateMemory(
            state.conversationHistory,
            { userInput: state.userInput, finalResponse: state.finalResponse },
            config.memory
          );
          if (result.action !== 'none') {
            logger.info('Conversation history compacted', {
              action: result.action,
              tokensBefore: result.tokensBefore,
              tokensAfter: result.tokensAfter,
            });
          }
          return mergeState(state, { conversationHistory: result.messages });
        },
      },
    ],
  });
}

// ── Request handling ─────────────────────────────────────────────────

export const chatRequestSchema = z.object({
  // Counted in code points, so an emoji is one character
  message: z
    .string()
    .min(1)
    .refine((message) => [...message].length <= MAX_MESSAGE_LENGTH, {
      message: `Message must be at most ${String(MAX_MESSAGE_LENGTH)} characters`,
    }),
  sessionId: z.string().min(1).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export interface ChatResponse {
  message: string;
  sessionId: string;
  /** Label the classifier produced for this message */
  intent: string;
  /** ISO 8601, UTC */
  timestamp: string;
}

/**
 * Error thrown when a chat request fails validation.
 */
export class ChatRequestError extends Error {
  constructor(public readonly issues: z.core.$ZodIssue[]) {
    super(
      `Invalid chat request: ${issues
        .map((issue) => {
          const path = issue.path.map(String).join('.');
          return path ? `${path}: ${issue.message}` : issue.message;
        })
        .join('; ')}`
    );
    this.name = 'ChatRequestError';
  }
}

export interface TravelAssistantConfig {
  /** Model for classification and answers */
  model: ChatModel;
  /** Model for summaries (default: `model`) */
  summaryModel?: ChatModel | undefined;
  tools: Tool[];
  sessionStore?: SessionStore | undefined;
  destination?: Destination | undefined;
  hintToolIds?: HintToolIds | undefined;
  memory?: Omit<MemoryConfig, 'summaryModel'> | undefined;
  /** Session id source for requests that carry none */
  generateSessionId?: (() => string) | undefined;
  now?: (() => Date) | undefined;
}

export class TravelAssistant {
  readonly workflow: Workflow<ConversationState>;
  readonly sessions: SessionStore;
  private readonly generateSessionId: () => string;
  private readonly now: () => Date;

  constructor(config: TravelAssistantConfig) {
    this.workflow = createAssistantWorkflow({
      model: config.model,
      registry: new ToolRegistry(config.tools),
      memory: normalizeMemoryConfig({
        ...config.memory,
        summaryModel: config.summaryModel ?? config.model,
      }),
      destination: config.destination,
      hintToolIds: config.hintToolIds,
    });
    this.sessions = config.sessionStore ?? new InMemorySessionStore();
    this.generateSessionId = config.generateSessionId ?? randomUUID;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Handle one user message. Workflow errors propagate.
   *
   * @throws ChatRequestError if the message is empty or longer than 1000 characters
   */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    const parsed = chatRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ChatRequestError(parsed.error.issues);
    }

    const { message } = parsed.data;
    const sessionId = parsed.data.sessionId ?? this.generateSessionId();

    logger.info('Processing chat request', { sessionId, message: message.slice(0, 50) });

    const history = await this.sessions.get(sessionId);
    const result = await this.workflow.run(createInitialState(message, history));
    await this.sessions.put(sessionId, result.conversationHistory);

    logger.info('Chat response generated', {
      sessionId,
      intent: result.intent,
      historyLength: result.conversationHistory.length,
    });

    return {
      message: result.finalResponse,
      sessionId,
      intent: result.intent,
      timestamp: this.now().toISOString(),
    };
  }

  /** Current history for a session. */
  async history(sessionId: string): Promise<ChatMessage[]> {
    return this.sessions.get(sessionId);
  }

  /**
   * Clear a session's history. Resolves to whether there was one.
   */
  async reset(sessionId: string): Promise<boolean> {
    const existed = await this.sessions.delete(sessionId);
    logger.info('Conversation reset', { sessionId, existed });
    return existed;
  }
}
