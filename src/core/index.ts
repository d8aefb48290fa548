/**
 * Core building blocks: tools, the tool registry, state and workflows.
 */

export { defineTool, parseToolArguments, ToolArgumentsError } from './tool.js';
export type { DefineToolConfig, Tool, ToolHandler } from './tool.js';

export { ToolRegistry, UNKNOWN_TOOL_RESULT } from './registry.js';

export {
  chatMessageSchema,
  conversationHistorySchema,
  conversationStateSchema,
  createInitialState,
  mergeState,
  StateValidationError,
  validateState,
} from './state.js';
export type { ConversationState } from './state.js';

export { defineWorkflow, WorkflowStepError } from './workflow.js';
export type { Workflow, WorkflowConfig, WorkflowStep } from './workflow.js';
