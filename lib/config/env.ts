import { z } from "zod";

import { DEFAULT_CURRENT_WEATHER_URL } from "../weather/request";
import { DEFAULT_WEATHER_TIMEOUT_MS } from "../weather/transport";
import { OpenWeatherMap, type OpenWeatherMapOptions } from "../weather/client";

const envSchema = z.object({
  OPENWEATHERMAP_API_KEY: z.string().default(""),
  OPENWEATHERMAP_UNITS: z.string().default(""),
  OPENWEATHERMAP_URL: z.string().url().default(DEFAULT_CURRENT_WEATHER_URL),
  OPENWEATHERMAP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_WEATHER_TIMEOUT_MS)
});

export type Env = z.infer<typeof envSchema>;

export function createEnv(source: Record<string, unknown> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.issues.map(issue => {
      const path = issue.path.join(".");
      return `${path}: ${issue.message}`;
    }).join(", ");
    throw new Error(`Environment validation failed: ${errors}`);
  }

  return result.data;
}

/** The key is not checked here; a missing key surfaces on the first lookup. */
export function clientFromEnv(
  source: Record<string, unknown> = process.env,
  options: Pick<OpenWeatherMapOptions, "logger"> = {}
): OpenWeatherMap {
  const env = createEnv(source);
  return new OpenWeatherMap(
    { apiKey: env.OPENWEATHERMAP_API_KEY, units: env.OPENWEATHERMAP_UNITS },
    { ...options, baseUrl: env.OPENWEATHERMAP_URL, timeoutMs: env.OPENWEATHERMAP_TIMEOUT_MS }
  );
}
