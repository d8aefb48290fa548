/**
 * ChatModel backed by a Vercel AI SDK LanguageModel.
 */

import { generateText, tool } from 'ai';
import type { LanguageModel, ModelMessage, ToolSet } from 'ai';
import type {
  ChatMessage,
  ChatModel,
  CompletionRequest,
  ModelReply,
  ToolDescriptor,
  ToolInvocation,
} from './types.js';

/**
 * Convert tool descriptors to an AI SDK tool set. Tools carry no `execute`,
 * so generateText stops after the model requests them.
 */
export function convertToolsToAiSdk(tools: ToolDescriptor[] | undefined): ToolSet | undefined {
  if (!tools || tools.length === 0) return undefined;

  const result: ToolSet = {};
  for (const descriptor of tools) {
    result[descriptor.name] = tool({
      description: descriptor.description,
      inputSchema: descriptor.inputSchema,
    });
  }
  return result;
}

function parseArgumentsLoose(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Convert chat messages to AI SDK model messages.
 */
export function convertMessagesToAiSdk(messages: ChatMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant': {
        if (!message.toolCalls || message.toolCalls.length === 0) {
          return { role: 'assistant', content: message.content };
        }
        return {
          role: 'assistant',
          content: [
            ...(message.content ? [{ type: 'text' as const, text: message.content }] : []),
            ...message.toolCalls.map((tc) => ({
              type: 'tool-call' as const,
              toolCallId: tc.id,
              toolName: tc.name,
              input: parseArgumentsLoose(tc.arguments),
            })),
          ],
        };
      }
      case 'tool':
        return {
          role: 'tool',
          content: [
            {
              type: 'tool-result',
              toolCallId: message.toolCallId,
              toolName: message.toolName,
              output: { type: 'text', value: message.content },
            },
          ],
        };
    }
  });
}

/**
 * Pull system messages out of a conversation. Their contents are joined in
 * order for generateText's `system` option; everything else stays a message.
 */
export function splitSystemMessages(messages: ChatMessage[]): {
  system: string | undefined;
  messages: ChatMessage[];
} {
  const system: string[] = [];
  const rest: ChatMessage[] = [];
  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
    } else {
      rest.push(message);
    }
  }
  return { system: system.length > 0 ? system.join('\n\n') : undefined, messages: rest };
}

/**
 * Convert an AI SDK tool call to a ToolInvocation with raw JSON arguments.
 */
export function convertAiSdkToolCall(tc: {
  toolCallId: string;
  toolName: string;
  input: unknown;
}): ToolInvocation {
  return {
    id: tc.toolCallId,
    name: tc.toolName,
    arguments: typeof tc.input === 'string' ? tc.input : JSON.stringify(tc.input ?? {}),
  };
}

export interface LLMOptions {
  model: LanguageModel;
  /** Sampling temperature; provider default when omitted */
  temperature?: number | undefined;
}

/**
 * LLM wraps a LanguageModel behind the ChatModel interface.
 *
 * @example
 * ```typescript
 * import { openai } from '@ai-sdk/openai';
 *
 * const llm = new LLM({ model: openai('gpt-4o-mini') });
 * const reply = await llm.complete({
 *   messages: [{ role: 'user', content: 'Hello!' }],
 * });
 * ```
 */
export class LLM implements ChatModel {
  readonly model: LanguageModel;
  private readonly temperature: number | undefined;

  constructor(options: LLMOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async complete(request: CompletionRequest): Promise<ModelReply> {
    const tools = convertToolsToAiSdk(request.tools);
    const { system, messages } = splitSystemMessages(request.messages);

    const result = await generateText({
      model: this.model,
      system,
      messages: convertMessagesToAiSdk(messages),
      tools,
      toolChoice: tools ? (request.toolChoice ?? 'auto') : undefined,
      temperature: this.temperature,
      // Retry policy belongs to the caller of the pipeline.
      maxRetries: 0,
    });

    if (result.toolCalls.length > 0) {
      return {
        type: 'tool_calls',
        text: result.text || null,
        toolCalls: result.toolCalls.map((tc) => convertAiSdkToolCall(tc)),
      };
    }

    return { type: 'text', text: result.text };
  }
}
