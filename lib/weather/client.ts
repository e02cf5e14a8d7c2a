import type { Logger } from "pino";

import { beginRequestLog, logger as rootLogger } from "../logging";
import { decodeCurrentWeather } from "./decode";
import type { CurrentWeatherResponse } from "./schema";
import { DEFAULT_WEATHER_TIMEOUT_MS, fetchWeatherBody } from "./transport";
import {
  DEFAULT_CURRENT_WEATHER_URL,
  buildCurrentWeatherUrl,
  type OpenWeatherMapConfig,
  type WeatherLookup
} from "./request";

export type OpenWeatherMapOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
};

/**
 * Current-weather client for OpenWeatherMap. Every lookup performs exactly
 * one GET with a fixed timeout; errors are thrown as-is, nothing is retried.
 */
export class OpenWeatherMap {
  readonly config: Readonly<OpenWeatherMapConfig>;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(config: OpenWeatherMapConfig, options: OpenWeatherMapOptions = {}) {
    this.config = Object.freeze({ ...config });
    this.baseUrl = options.baseUrl ?? DEFAULT_CURRENT_WEATHER_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEATHER_TIMEOUT_MS;
    this.log = options.logger ?? rootLogger;
  }

  currentWeatherFromCity(city: string): Promise<CurrentWeatherResponse> {
    return this.currentWeather({ mode: "city", city });
  }

  currentWeatherFromCoordinates(lat: number, lon: number): Promise<CurrentWeatherResponse> {
    return this.currentWeather({ mode: "coordinates", lat, lon });
  }

  currentWeatherFromZip(zip: string | number): Promise<CurrentWeatherResponse> {
    return this.currentWeather({ mode: "zip", zip });
  }

  currentWeatherFromCityId(id: number): Promise<CurrentWeatherResponse> {
    return this.currentWeather({ mode: "id", id });
  }

  async currentWeather(lookup: WeatherLookup): Promise<CurrentWeatherResponse> {
    const url = buildCurrentWeatherUrl(lookup, this.config, this.baseUrl);

    const requestLog = beginRequestLog(this.log, {
      component: "openweathermap",
      lookup: lookup.mode,
      units: this.config.units
    });
    requestLog.start({ host: url.host, path: url.pathname });

    try {
      const { status, body } = await fetchWeatherBody(url, this.timeoutMs);
      const weather = decodeCurrentWeather(body, status);
      requestLog.succeed({ status, locationId: weather.id });
      return weather;
    } catch (err) {
      requestLog.fail(err);
      throw err;
    }
  }
}
