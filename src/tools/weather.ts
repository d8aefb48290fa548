/**
 * Weather tool: current conditions and the 5-day forecast for a location.
 *
 * Defaults to the OpenWeather forecast API using raw fetch(). The tool never
 * fails: when the client throws, the model receives a degraded payload that
 * says so.
 */

import { z } from 'zod';
import { defineTool, type Tool } from '../core/tool.js';
import type { FetchFn } from './travel-search.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const logger = createLogger({ name: 'weather' });

export const WEATHER_TOOL_ID = 'get_weather_info';
export const DEFAULT_OPENWEATHER_BASE_URL = 'https://api.openweathermap.org/data/2.5/forecast';

export interface WeatherClient {
  /** Raw forecast document for a location. Throws on transport or API errors. */
  getForecast(location: string): Promise<unknown>;
}

/** Payload returned in place of a forecast when the weather service fails. */
export interface WeatherFallback {
  error: string;
  fallback: {
    location: string;
    current: { temp: number; description: string };
    message: string;
  };
}

export function buildWeatherFallback(location: string): WeatherFallback {
  return {
    error: `Weather service temporarily unavailable for ${location}`,
    fallback: {
      location,
      // Kelvin, the API's default unit
      current: { temp: 295.15, description: 'partly cloudy' },
      message: 'Using fallback data',
    },
  };
}

// ── OpenWeather implementation ───────────────────────────────────────

export interface OpenWeatherClientConfig {
  /** OpenWeather API key. Falls back to the OPENWEATHER_API_KEY environment variable. */
  apiKey?: string | undefined;
  /** @default 'https://api.openweathermap.org/data/2.5/forecast' */
  baseUrl?: string | undefined;
  fetch?: FetchFn | undefined;
}

export function createOpenWeatherClient(config: OpenWeatherClientConfig = {}): WeatherClient {
  const fetchFn: FetchFn = config.fetch ?? fetch;

  return {
    async getForecast(location: string): Promise<unknown> {
      const apiKey = config.apiKey ?? process.env['OPENWEATHER_API_KEY'];
      if (!apiKey) {
        throw new Error(
          'OpenWeather API key is required. Provide it via the apiKey option or set the OPENWEATHER_API_KEY environment variable.'
        );
      }

      const url = new URL(config.baseUrl ?? DEFAULT_OPENWEATHER_BASE_URL);
      url.searchParams.set('q', location);
      url.searchParams.set('appid', apiKey);

      const response = await fetchFn(url.toString());
      if (!response.ok) {
        throw new Error(
          `OpenWeather API error (${String(response.status)}): ${await response.text()}`
        );
      }

      const data: unknown = await response.json();
      return data;
    },
  };
}

// ── Factory ──────────────────────────────────────────────────────────

export interface WeatherToolConfig {
  client: WeatherClient;
  /** Location used when the model does not name one. @default 'Tokyo' */
  destination?: string | undefined;
  /** Tool identifier exposed to the LLM. @default 'get_weather_info' */
  toolId?: string | undefined;
}

export function createWeatherTool(config: WeatherToolConfig): Tool {
  const destination = config.destination ?? 'Tokyo';

  const inputSchema = z.object({
    location: z
      .string()
      .optional()
      .describe(`Location to get weather for (defaults to ${destination} if not specified)`),
  });

  return defineTool(
    {
      id: config.toolId ?? WEATHER_TOOL_ID,
      description:
        `Get current weather and 5-day forecast for ${destination}. ` +
        'Returns multi-day forecast data including today, tomorrow, and up to 5 days ahead.',
      inputSchema,
    },
    async (input) => {
      const location = input.location?.trim() || destination;

      try {
        const data = await config.client.getForecast(location);
        return JSON.stringify(data ?? null, null, 2);
      } catch (err) {
        logger.warn('Weather lookup failed, using fallback data', {
          location,
          error: errorMessage(err),
        });
        return JSON.stringify(buildWeatherFallback(location), null, 2);
      }
    }
  );
}
