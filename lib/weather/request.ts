import { MissingApiKeyError } from "./errors";

export const DEFAULT_CURRENT_WEATHER_URL = "http://api.openweathermap.org/data/2.5/weather";

export type OpenWeatherMapConfig = {
  apiKey: string;
  /** Passed through as `units` (e.g. "metric", "imperial"); empty means the provider default. */
  units?: string;
};

export type WeatherLookup =
  | { mode: "city"; city: string }
  | { mode: "coordinates"; lat: number; lon: number }
  | { mode: "zip"; zip: string | number }
  | { mode: "id"; id: number };

export type LookupMode = WeatherLookup["mode"];

function formatCoordinate(value: number): string {
  return value.toFixed(6);
}

function applyLookup(url: URL, lookup: WeatherLookup): void {
  switch (lookup.mode) {
    case "city":
      url.searchParams.set("q", lookup.city);
      return;
    case "coordinates":
      url.searchParams.set("lat", formatCoordinate(lookup.lat));
      url.searchParams.set("lon", formatCoordinate(lookup.lon));
      return;
    case "zip":
      url.searchParams.set("zip", String(lookup.zip));
      return;
    case "id":
      url.searchParams.set("id", String(lookup.id));
      return;
  }
}

export function assertApiKey(config: OpenWeatherMapConfig): void {
  if (!config.apiKey) throw new MissingApiKeyError();
}

export function buildCurrentWeatherUrl(
  lookup: WeatherLookup,
  config: OpenWeatherMapConfig,
  baseUrl: string = DEFAULT_CURRENT_WEATHER_URL
): URL {
  assertApiKey(config);

  const url = new URL(baseUrl);
  applyLookup(url, lookup);
  if (config.units) {
    url.searchParams.set("units", config.units);
  }
  url.searchParams.set("APPID", config.apiKey);
  return url;
}
