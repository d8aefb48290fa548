/**
 * Environment configuration.
 *
 * Variables are read from `process.env` (the CLI loads `.env` first) and
 * validated with zod. Empty values count as unset.
 */

import { z } from 'zod';
import type { Destination } from './agents/prompts.js';
import { DEFAULT_MAX_CONVERSATION_TOKENS, DEFAULT_FALLBACK_RECENT_MESSAGES } from './memory/types.js';
import { DEFAULT_OPENWEATHER_BASE_URL } from './tools/weather.js';
import { LOG_LEVELS } from './utils/logger.js';
import type { LogLevel } from './utils/logger.js';

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  PINECONE_API_KEY: z.string().optional(),
  // Pinecone lists hosts without a scheme
  PINECONE_INDEX_HOST: z.string().optional(),
  PINECONE_NAMESPACE: z.string().optional(),
  OPENWEATHER_API_KEY: z.string().optional(),
  OPENWEATHER_BASE_URL: z.url().default(DEFAULT_OPENWEATHER_BASE_URL),
  ASSISTANT_DESTINATION: z.string().default('Tokyo'),
  ASSISTANT_COUNTRY: z.string().optional(),
  MAX_CONVERSATION_TOKENS: positiveInt.default(DEFAULT_MAX_CONVERSATION_TOKENS),
  FALLBACK_RECENT_MESSAGES: positiveInt.default(DEFAULT_FALLBACK_RECENT_MESSAGES),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FILE: z.string().optional(),
});

export interface AppConfig {
  openai: {
    apiKey: string;
    model: string;
    embeddingModel: string;
  };
  pinecone: {
    apiKey?: string | undefined;
    indexHost?: string | undefined;
    namespace?: string | undefined;
  };
  openWeather: {
    apiKey?: string | undefined;
    baseUrl: string;
  };
  destination: Destination;
  memory: {
    maxConversationTokens: number;
    fallbackRecentMessages: number;
  };
  logLevel: LogLevel;
  /** Append logs here instead of the console */
  logFile?: string | undefined;
}

/**
 * Error thrown when the environment does not describe a usable configuration.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: z.core.$ZodIssue[]) {
    const details = issues
      .map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
    super(`Invalid configuration: ${details}`);
    this.name = 'ConfigError';
  }
}

function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * @throws ConfigError if a variable is missing or malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutEmptyValues(env));
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }

  const vars = result.data;
  // Only the default city comes with a default country
  const country =
    vars.ASSISTANT_COUNTRY ?? (vars.ASSISTANT_DESTINATION === 'Tokyo' ? 'Japan' : undefined);

  return {
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
      embeddingModel: vars.OPENAI_EMBEDDING_MODEL,
    },
    pinecone: {
      apiKey: vars.PINECONE_API_KEY,
      indexHost: vars.PINECONE_INDEX_HOST,
      namespace: vars.PINECONE_NAMESPACE,
    },
    openWeather: {
      apiKey: vars.OPENWEATHER_API_KEY,
      baseUrl: vars.OPENWEATHER_BASE_URL,
    },
    destination: { city: vars.ASSISTANT_DESTINATION, country },
    memory: {
      maxConversationTokens: vars.MAX_CONVERSATION_TOKENS,
      fallbackRecentMessages: vars.FALLBACK_RECENT_MESSAGES,
    },
    logLevel: vars.LOG_LEVEL,
    logFile: vars.LOG_FILE,
  };
}
