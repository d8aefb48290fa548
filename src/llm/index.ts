export {
  LLM,
  convertAiSdkToolCall,
  convertMessagesToAiSdk,
  convertToolsToAiSdk,
  splitSystemMessages,
} from './llm.js';
export type { LLMOptions } from './llm.js';
export { replyText } from './types.js';
export type {
  AssistantMessage,
  ChatMessage,
  ChatModel,
  CompletionRequest,
  ModelReply,
  Role,
  SystemMessage,
  ToolDescriptor,
  ToolInvocation,
  ToolMessage,
  UserMessage,
} from './types.js';
export { ScriptedModel, textReply, toolCallReply } from './testing.js';
export type { ScriptedReply } from './testing.js';
