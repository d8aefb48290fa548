/**
 * Wires configuration to the production model, tools and session store.
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { AppConfig } from './config.js';
import { TravelAssistant } from './agents/assistant.js';
import { LLM } from './llm/llm.js';
import type { ChatModel } from './llm/types.js';
import type { SessionStore } from './sessions/store.js';
import {
  createPineconeSearcher,
  createQueryEmbedder,
  createTravelSearchTool,
  type FetchFn,
} from './tools/travel-search.js';
import { createOpenWeatherClient, createWeatherTool } from './tools/weather.js';

export interface AppOverrides {
  /** Replaces the OpenAI chat model */
  model?: ChatModel | undefined;
  sessionStore?: SessionStore | undefined;
  /** Used by the Pinecone and OpenWeather clients */
  fetch?: FetchFn | undefined;
}

export function createTravelAssistant(
  config: AppConfig,
  overrides: AppOverrides = {}
): TravelAssistant {
  const openai = createOpenAI({ apiKey: config.openai.apiKey });
  const model = overrides.model ?? new LLM({ model: openai.chat(config.openai.model) });

  const searchTool = createTravelSearchTool({
    destination: config.destination.city,
    searcher: createPineconeSearcher({
      embedQuery: createQueryEmbedder(openai.textEmbeddingModel(config.openai.embeddingModel)),
      apiKey: config.pinecone.apiKey,
      indexHost: config.pinecone.indexHost,
      namespace: config.pinecone.namespace,
      fetch: overrides.fetch,
    }),
  });

  const weatherTool = createWeatherTool({
    destination: config.destination.city,
    client: createOpenWeatherClient({
      apiKey: config.openWeather.apiKey,
      baseUrl: config.openWeather.baseUrl,
      fetch: overrides.fetch,
    }),
  });

  return new TravelAssistant({
    model,
    tools: [searchTool, weatherTool],
    sessionStore: overrides.sessionStore,
    destination: config.destination,
    memory: config.memory,
  });
}
