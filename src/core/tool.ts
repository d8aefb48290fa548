/**
 * Tool definition and creation.
 *
 * Provides the defineTool function for creating typed tools that can be
 * exposed to LLMs. A tool pairs a zod input schema with a handler that
 * returns the text the model will read as the tool result.
 */

import type { ZodType } from 'zod';
import type { ToolDescriptor } from '../llm/types.js';

// ── Errors ───────────────────────────────────────────────────────────

/**
 * Error thrown when tool arguments are not valid JSON or fail schema validation.
 */
export class ToolArgumentsError extends Error {
  constructor(
    public readonly toolName: string,
    message: string,
    public readonly issues: unknown[] = []
  ) {
    super(`Invalid arguments for tool "${toolName}": ${message}`);
    this.name = 'ToolArgumentsError';
  }
}

/**
 * Parse raw JSON arguments and validate them against a schema.
 * An empty string is read as `{}`.
 */
export function parseToolArguments<TInput>(
  toolName: string,
  rawArguments: string,
  schema: ZodType<TInput>
): TInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArguments.trim() || '{}');
  } catch (err) {
    throw new ToolArgumentsError(toolName, err instanceof Error ? err.message : String(err));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
    throw new ToolArgumentsError(toolName, details, result.error.issues);
  }
  return result.data;
}

// ── DefineToolConfig ─────────────────────────────────────────────────

export interface DefineToolConfig<TInput> {
  /** Name the model calls the tool by */
  id: string;
  /** Tool description shown to LLMs */
  description: string;
  /** Zod schema for input validation; its JSON schema is what the model sees */
  inputSchema: ZodType<TInput>;
}

export type ToolHandler<TInput> = (input: TInput) => Promise<string>;

/**
 * A tool the responder can dispatch to. Arguments arrive as the raw JSON
 * text the model produced.
 */
export interface Tool {
  readonly id: string;
  readonly description: string;
  readonly inputSchema: ZodType;
  /** Name, description and schema as offered to the model */
  toDescriptor(): ToolDescriptor;
  /** Parse, validate and run. Throws ToolArgumentsError on bad arguments. */
  execute(rawArguments: string): Promise<string>;
}

// ── defineTool ───────────────────────────────────────────────────────

/**
 * Define a tool.
 *
 * @example
 * ```typescript
 * const searchSpots = defineTool({
 *   id: 'search_travel_info',
 *   description: 'Search temples, shrines and viewpoints',
 *   inputSchema: z.object({ query: z.string().describe('Search query') }),
 * }, async (input) => formatResults(await searcher.search(input.query, { topK: 5 })));
 *
 * await searchSpots.execute('{"query":"temples in Asakusa"}');
 * ```
 */
export function defineTool<TInput>(
  config: DefineToolConfig<TInput>,
  handler: ToolHandler<TInput>
): Tool {
  const { inputSchema } = config;

  return {
    id: config.id,
    description: config.description,
    inputSchema,
    toDescriptor(): ToolDescriptor {
      return { name: config.id, description: config.description, inputSchema };
    },
    async execute(rawArguments: string): Promise<string> {
      return handler(parseToolArguments(config.id, rawArguments, inputSchema));
    },
  };
}
