/**
 * Message and model-client types shared by every pipeline stage.
 */

import type { ZodType } from 'zod';

export type Role = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A tool call requested by the model. `arguments` is the raw JSON text the
 * model produced; it is parsed and validated only at dispatch.
 */
export interface ToolInvocation {
  id: string;
  name: string;
  arguments: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls?: ToolInvocation[] | undefined;
}

/** Result of one tool invocation, tagged with the id of the call that caused it. */
export interface ToolMessage {
  role: 'tool';
  content: string;
  toolCallId: string;
  toolName: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/** What the model needs to know about a tool in order to call it. */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ZodType;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  /** Tools the model may call. Omit for a plain completion. */
  tools?: ToolDescriptor[] | undefined;
  toolChoice?: 'auto' | undefined;
}

export type ModelReply =
  | { type: 'text'; text: string }
  | { type: 'tool_calls'; text: string | null; toolCalls: ToolInvocation[] };

/**
 * Language model client. Implementations must support plain completions
 * (no tools) for summarization and second-round generation.
 */
export interface ChatModel {
  complete(request: CompletionRequest): Promise<ModelReply>;
}

/** Text of a reply; tool-call replies yield whatever text accompanied them. */
export function replyText(reply: ModelReply): string {
  return reply.type === 'text' ? reply.text : (reply.text ?? '');
}
