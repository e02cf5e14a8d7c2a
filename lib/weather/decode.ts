import type { z } from "zod";

import { WeatherDecodeError, type DecodeIssue } from "./errors";
import {
  currentWeatherResponseSchema,
  forecastResponseSchema,
  providerErrorSchema,
  type CurrentWeatherResponse,
  type ForecastResponse
} from "./schema";

function parseJson(body: string, status?: number): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new WeatherDecodeError(`Malformed JSON in weather response: ${reason}`, { status, cause: err });
  }
}

function toIssues(error: z.ZodError): DecodeIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join(".") || "(root)",
    message: issue.message
  }));
}

function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string, body: string, status?: number): T {
  const raw = parseJson(body, status);
  const result = schema.safeParse(raw);
  if (result.success) return result.data;

  const providerError = providerErrorSchema.safeParse(raw);
  if (providerError.success) {
    throw new WeatherDecodeError(
      `Unexpected ${label} document: provider error ${providerError.data.cod} - ${providerError.data.message}`,
      { status, issues: toIssues(result.error) }
    );
  }

  const issues = toIssues(result.error);
  const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join(", ");
  throw new WeatherDecodeError(`Unexpected ${label} document: ${summary}`, { status, issues });
}

export function decodeCurrentWeather(body: string, status?: number): CurrentWeatherResponse {
  return decodeWith(currentWeatherResponseSchema, "current weather", body, status);
}

export function decodeForecast(body: string, status?: number): ForecastResponse {
  return decodeWith(forecastResponseSchema, "forecast", body, status);
}
