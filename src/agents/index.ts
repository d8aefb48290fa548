export {
  ChatRequestError,
  MAX_MESSAGE_LENGTH,
  TravelAssistant,
  WORKFLOW_ID,
  chatRequestSchema,
  createAssistantWorkflow,
} from './assistant.js';
export type {
  AssistantWorkflowConfig,
  ChatRequest,
  ChatResponse,
  TravelAssistantConfig,
} from './assistant.js';
export { classifyIntent } from './intent.js';
export { buildResponderMessages, generateResponse } from './responder.js';
export type { ResponderConfig, ResponderInput } from './responder.js';
export {
  DEFAULT_DESTINATION,
  FALLBACK_RESPONSE,
  INTENTS,
  buildIntentPrompt,
  buildSystemPrompt,
  intentHint,
  isIntent,
  refusalMessage,
} from './prompts.js';
export type { Destination, HintToolIds, Intent } from './prompts.js';
