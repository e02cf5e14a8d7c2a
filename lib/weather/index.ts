export { OpenWeatherMap } from "./client";
export type { OpenWeatherMapOptions } from "./client";

export { DEFAULT_CURRENT_WEATHER_URL, assertApiKey, buildCurrentWeatherUrl } from "./request";
export type { LookupMode, OpenWeatherMapConfig, WeatherLookup } from "./request";

export { DEFAULT_WEATHER_TIMEOUT_MS, fetchWeatherBody } from "./transport";
export type { WeatherHttpResult } from "./transport";

export { decodeCurrentWeather, decodeForecast } from "./decode";

export {
  MissingApiKeyError,
  WeatherBodyReadError,
  WeatherDecodeError,
  WeatherError,
  WeatherTransportError
} from "./errors";
export type { DecodeIssue } from "./errors";

export {
  currentWeatherResponseSchema,
  forecastResponseSchema
} from "./schema";
export type {
  City,
  Clouds,
  Condition,
  Coord,
  CurrentWeatherResponse,
  ForecastEntry,
  ForecastResponse,
  MainMeasurements,
  Rain,
  Sys,
  Wind
} from "./schema";
