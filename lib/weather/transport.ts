import { WeatherBodyReadError, WeatherTransportError } from "./errors";

export const DEFAULT_WEATHER_TIMEOUT_MS = 60_000;

export type WeatherHttpResult = {
  status: number;
  body: string;
};

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Issues one GET and reads the whole body. The timeout covers both the
 * request and the body read. Non-2xx responses are returned as-is; the
 * decoder decides what their body means.
 */
export async function fetchWeatherBody(
  url: URL,
  timeoutMs = DEFAULT_WEATHER_TIMEOUT_MS
): Promise<WeatherHttpResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    let res: Response;
    try {
      res = await fetch(url, { signal: controller.signal });
    } catch (err) {
      const reason = isAbortError(err)
        ? `request timed out after ${timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new WeatherTransportError(`Weather request failed: ${reason}`, { cause: err });
    }

    try {
      const body = await res.text();
      return { status: res.status, body };
    } catch (err) {
      const reason = isAbortError(err)
        ? `timed out after ${timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new WeatherBodyReadError(`Failed to read weather response body: ${reason}`, res.status, { cause: err });
    }
  } finally {
    clearTimeout(timer);
  }
}
