/**
 * Travel search tool. Lets the responder look up attractions, temples,
 * viewpoints and neighborhoods of the destination.
 *
 * Defaults to a Pinecone index queried over its REST API with raw fetch(),
 * using an embedding of the query from the model SDK. Any other backend can
 * be plugged in via a custom searcher.
 *
 * @example
 * ```typescript
 * const searchTool = createTravelSearchTool({
 *   searcher: createPineconeSearcher({
 *     embedQuery: createQueryEmbedder(openai.textEmbeddingModel('text-embedding-3-small')),
 *   }),
 * });
 * ```
 */

import { embed, type EmbeddingModel } from 'ai';
import { z } from 'zod';
import { defineTool, type Tool } from '../core/tool.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const logger = createLogger({ name: 'travel-search' });

export const TRAVEL_SEARCH_TOOL_ID = 'search_travel_info';
export const DEFAULT_TOP_K = 5;
export const NO_RESULTS_MESSAGE = 'No travel information found for this query.';

// ── Result types (backend-agnostic) ──────────────────────────────────

/** One indexed document, most relevant first in a result list. */
export interface TravelSearchResult {
  id: string;
  title: string;
  content: string;
  area: string;
  category: string;
  /** Similarity score reported by the index. */
  score?: number | undefined;
}

/** Exact-match metadata filter. */
export interface TravelSearchFilter {
  category?: string | undefined;
  area?: string | undefined;
}

export interface TravelSearchOptions {
  topK: number;
  filter?: TravelSearchFilter | undefined;
}

export interface TravelSearcher {
  search(query: string, options: TravelSearchOptions): Promise<TravelSearchResult[]>;
}

/** Turns query text into the vector the index is searched with. */
export type QueryEmbedder = (text: string) => Promise<number[]>;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

// ── Query embedding ──────────────────────────────────────────────────

export function createQueryEmbedder(model: EmbeddingModel<string>): QueryEmbedder {
  return async (text: string) => {
    const { embedding } = await embed({ model, value: text, maxRetries: 0 });
    return embedding;
  };
}

// ── Pinecone implementation ──────────────────────────────────────────

export interface PineconeSearcherConfig {
  embedQuery: QueryEmbedder;
  /** Pinecone API key. Falls back to the PINECONE_API_KEY environment variable. */
  apiKey?: string | undefined;
  /**
   * Index host, e.g. `travel-abc123.svc.pinecone.io`; `https://` is assumed without a
   * scheme. Falls back to PINECONE_INDEX_HOST.
   */
  indexHost?: string | undefined;
  namespace?: string | undefined;
  fetch?: FetchFn | undefined;
}

const pineconeQueryResponseSchema = z.object({
  matches: z
    .array(
      z.object({
        id: z.string(),
        score: z.number().optional(),
        metadata: z.record(z.string(), z.unknown()).optional(),
      })
    )
    .default([]),
});

function metadataText(metadata: Record<string, unknown> | undefined, key: string): string {
  const value = metadata?.[key];
  return typeof value === 'string' ? value : '';
}

/** Pinecone filter document: `{ category: { $eq: 'temple' } }`. */
export function toPineconeFilter(
  filter: TravelSearchFilter | undefined
): Record<string, { $eq: string }> | undefined {
  if (!filter) return undefined;

  const clauses: Record<string, { $eq: string }> = {};
  if (filter.category) clauses['category'] = { $eq: filter.category };
  if (filter.area) clauses['area'] = { $eq: filter.area };
  return Object.keys(clauses).length > 0 ? clauses : undefined;
}

/** Query endpoint for an index host given with or without a scheme. */
export function pineconeQueryUrl(indexHost: string): string {
  const base = /^https?:\/\//i.test(indexHost) ? indexHost : `https://${indexHost}`;
  return `${base.replace(/\/+$/, '')}/query`;
}

export function createPineconeSearcher(config: PineconeSearcherConfig): TravelSearcher {
  const fetchFn: FetchFn = config.fetch ?? fetch;

  return {
    async search(query: string, options: TravelSearchOptions): Promise<TravelSearchResult[]> {
      const apiKey = config.apiKey ?? process.env['PINECONE_API_KEY'];
      const indexHost = config.indexHost ?? process.env['PINECONE_INDEX_HOST'];
      if (!apiKey || !indexHost) {
        throw new Error(
          'Pinecone is not configured. Provide apiKey and indexHost or set PINECONE_API_KEY and PINECONE_INDEX_HOST.'
        );
      }

      const vector = await config.embedQuery(query);
      const body = {
        vector,
        topK: options.topK,
        includeMetadata: true,
        namespace: config.namespace,
        filter: toPineconeFilter(options.filter),
      };

      const response = await fetchFn(pineconeQueryUrl(indexHost), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Api-Key': apiKey,
        },
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        throw new Error(`Pinecone API error (${String(response.status)}): ${await response.text()}`);
      }

      const data = pineconeQueryResponseSchema.parse(await response.json());

      return data.matches.map((match) => ({
        id: match.id,
        title: metadataText(match.metadata, 'title'),
        content: metadataText(match.metadata, 'content'),
        area: metadataText(match.metadata, 'area'),
        category: metadataText(match.metadata, 'category'),
        score: match.score,
      }));
    },
  };
}

// ── Formatting ───────────────────────────────────────────────────────

export function formatTravelResult(result: TravelSearchResult): string {
  return (
    `• ${result.title}\n` +
    `  ${result.content}\n` +
    `  Location: ${result.area} | Category: ${result.category}\n`
  );
}

export function formatTravelResults(results: readonly TravelSearchResult[]): string {
  if (results.length === 0) {
    return NO_RESULTS_MESSAGE;
  }
  return results.map(formatTravelResult).join('\n');
}

// ── Factory ──────────────────────────────────────────────────────────

export interface TravelSearchToolConfig {
  searcher: TravelSearcher;
  /** @default 'Tokyo' */
  destination?: string | undefined;
  /** @default 5 */
  topK?: number | undefined;
  /** Tool identifier exposed to the LLM. @default 'search_travel_info' */
  toolId?: string | undefined;
}

/**
 * Create the travel search tool. Search failures are returned to the model
 * as text rather than thrown.
 */
export function createTravelSearchTool(config: TravelSearchToolConfig): Tool {
  const destination = config.destination ?? 'Tokyo';
  const topK = config.topK ?? DEFAULT_TOP_K;

  const inputSchema = z.object({
    query: z
      .string()
      .describe(`Search query for ${destination} attractions (e.g. 'historic temples', 'best views')`),
    category: z
      .string()
      .optional()
      .describe('Only return places of this category (e.g. temple, shrine, viewpoint)'),
    area: z.string().optional().describe('Only return places in this neighborhood'),
  });

  return defineTool(
    {
      id: config.toolId ?? TRAVEL_SEARCH_TOOL_ID,
      description: `Search for information about ${destination} temples, shrines, views, neighborhoods, and attractions`,
      inputSchema,
    },
    async (input) => {
      const filter =
        input.category || input.area ? { category: input.category, area: input.area } : undefined;

      try {
        const results = await config.searcher.search(input.query, { topK, filter });
        logger.debug('Travel search completed', { query: input.query, results: results.length });
        return formatTravelResults(results);
      } catch (err) {
        logger.error('Travel search failed', { query: input.query, error: errorMessage(err) });
        return `Error searching travel information: ${errorMessage(err)}`;
      }
    }
  );
}
