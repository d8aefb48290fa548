/**
 * Scripted ChatModel for tests: replays a fixed sequence of replies and
 * records every request it received.
 */

import type { ChatModel, CompletionRequest, ModelReply, ToolInvocation } from './types.js';

export type ScriptedReply =
  | ModelReply
  | Error
  | ((request: CompletionRequest) => ModelReply | Promise<ModelReply>);

export class ScriptedModel implements ChatModel {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  /** Replies not consumed yet. */
  get remaining(): number {
    return this.replies.length;
  }

  async complete(request: CompletionRequest): Promise<ModelReply> {
    // Callers may keep appending to the array they passed in
    this.requests.push({ ...request, messages: [...request.messages] });

    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`ScriptedModel ran out of replies at request ${String(this.requests.length)}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next(request) : next;
  }
}

export function textReply(text: string): ModelReply {
  return { type: 'text', text };
}

export function toolCallReply(toolCalls: ToolInvocation[], text: string | null = null): ModelReply {
  return { type: 'tool_calls', text, toolCalls };
}
