export {
  DEFAULT_TOP_K,
  NO_RESULTS_MESSAGE,
  TRAVEL_SEARCH_TOOL_ID,
  createPineconeSearcher,
  createQueryEmbedder,
  createTravelSearchTool,
  formatTravelResult,
  formatTravelResults,
  pineconeQueryUrl,
  toPineconeFilter,
} from './travel-search.js';
export type {
  FetchFn,
  PineconeSearcherConfig,
  QueryEmbedder,
  TravelSearchFilter,
  TravelSearchOptions,
  TravelSearchResult,
  TravelSearcher,
  TravelSearchToolConfig,
} from './travel-search.js';

export {
  DEFAULT_OPENWEATHER_BASE_URL,
  WEATHER_TOOL_ID,
  buildWeatherFallback,
  createOpenWeatherClient,
  createWeatherTool,
} from './weather.js';
export type {
  OpenWeatherClientConfig,
  WeatherClient,
  WeatherFallback,
  WeatherToolConfig,
} from './weather.js';
