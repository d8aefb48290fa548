/**
 * Tool registry: maps the names the model uses to the tools that serve them.
 */

import type { ToolDescriptor, ToolInvocation } from '../llm/types.js';
import type { Tool } from './tool.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ name: 'tool-registry' });

/** Result text handed to the model when it calls a tool nobody registered. */
export const UNKNOWN_TOOL_RESULT = 'Unknown function';

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Register a tool. A tool with the same id is silently replaced.
   */
  register(tool: Tool): void {
    this.tools.set(tool.id, tool);
  }

  /** Descriptors for every registered tool, in registration order. */
  descriptors(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => tool.toDescriptor());
  }

  /**
   * Run the tool an invocation names. Unknown names resolve to
   * UNKNOWN_TOOL_RESULT; argument and handler errors propagate.
   */
  async dispatch(invocation: ToolInvocation): Promise<string> {
    const tool = this.tools.get(invocation.name);
    if (!tool) {
      logger.warn('Model requested an unregistered tool', {
        tool: invocation.name,
        callId: invocation.id,
      });
      return UNKNOWN_TOOL_RESULT;
    }

    logger.debug('Dispatching tool call', { tool: invocation.name, callId: invocation.id });
    return tool.execute(invocation.arguments);
  }
}
