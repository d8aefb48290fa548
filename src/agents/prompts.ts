/**
 * Fixed prompt text for the classifier and the responder.
 */

import { TRAVEL_SEARCH_TOOL_ID } from '../tools/travel-search.js';
import { WEATHER_TOOL_ID } from '../tools/weather.js';

/** The city the assistant is restricted to. */
export interface Destination {
  city: string;
  country?: string | undefined;
}

export const DEFAULT_DESTINATION: Destination = { city: 'Tokyo', country: 'Japan' };

export const INTENTS = ['travel_info', 'weather_info', 'mixed', 'small_talk'] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

export const FALLBACK_RESPONSE = "I'm sorry, I'm having trouble processing your request right now.";

export function refusalMessage(destination: Destination): string {
  return `I can only help you with ${destination.city} information.`;
}

export function buildIntentPrompt(destination: Destination): string {
  const city = destination.city;
  return `You are an intent classifier for a ${city} travel assistant.

Classify this user input into exactly ONE category:
- travel_info: asking about temples, shrines, views, neighborhoods, places to visit in ${city}
- weather_info: asking about weather, forecast, temperature, rain in ${city}
- mixed: asking about BOTH travel places AND weather (even if one is primary)
- small_talk: greetings, general conversation, unrelated topics

Respond with ONLY the category name (no explanation).`;
}

export interface HintToolIds {
  search: string;
  weather: string;
}

const DEFAULT_HINT_TOOL_IDS: HintToolIds = {
  search: TRAVEL_SEARCH_TOOL_ID,
  weather: WEATHER_TOOL_ID,
};

/**
 * Steering text for an intent. Labels outside the known set get no hint.
 */
export function intentHint(intent: string, toolIds: HintToolIds = DEFAULT_HINT_TOOL_IDS): string {
  if (!isIntent(intent)) {
    return '';
  }

  const hints: Record<Intent, string> = {
    travel_info: `HINT: This appears to be a travel question - you'll likely need the ${toolIds.search} tool.`,
    weather_info: `HINT: This appears to be a weather question - you'll likely need the ${toolIds.weather} tool.`,
    mixed: `HINT: This query involves both travel and weather - you'll likely need BOTH ${toolIds.search} and ${toolIds.weather} tools.`,
    small_talk: "HINT: This appears to be casual conversation - you probably won't need any tools.",
  };
  return hints[intent];
}

export function buildSystemPrompt(destination: Destination, hint: string): string {
  const place = destination.country ? `${destination.city}, ${destination.country}` : destination.city;
  return `You are a ${destination.city} travel assistant. You EXCLUSIVELY provide information about ${place}. NO OTHER CITIES ALLOWED.

${hint}

If user asks about ANY other location = Respond: "${refusalMessage(destination)}"
Use your tools to find answers to the user's question.
In case of not finding relevant informations after using your tools, specify the response includes information from your own knowledge.
`;
}
