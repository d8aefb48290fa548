/**
 * Destination travel assistant.
 *
 * @example
 * ```typescript
 * import { createTravelAssistant, loadConfig } from 'tokyo-travel-assistant';
 *
 * const assistant = createTravelAssistant(loadConfig());
 * const reply = await assistant.chat({ message: 'Which temples are in Asakusa?' });
 * console.log(reply.message, reply.intent);
 * ```
 */

export * from './agents/index.js';
export * from './core/index.js';
export * from './llm/index.js';
export * from './memory/index.js';
export * from './sessions/index.js';
export * from './tools/index.js';

export { createTravelAssistant } from './app.js';
export type { AppOverrides } from './app.js';
export { ConfigError, envSchema, loadConfig } from './config.js';
export type { AppConfig } from './config.js';

export {
  LOG_LEVELS,
  configureLogging,
  createLogger,
  errorMessage,
  formatLogEntry,
  isLogLevel,
  resetLogging,
} from './utils/logger.js';
export type {
  ConfigureLoggingOptions,
  LogContext,
  LogEntry,
  LogHandler,
  Logger,
  LoggerOptions,
  LogLevel,
} from './utils/logger.js';
