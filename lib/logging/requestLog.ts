import type { Logger } from "pino";

import { childLogger, ensureRequestId, toErrorObject, type LogContext } from "./logger";

/**
 * Structured log lines for one weather request: `weather.request.start`,
 * then exactly one of `weather.request.success` / `weather.request.failed`,
 * all sharing a request id and carrying `durationMs` once finished.
 */
export type RequestLog = {
  readonly requestId: string;
  readonly logger: Logger;
  start(fields?: Record<string, unknown>): void;
  succeed(fields?: Record<string, unknown>): void;
  fail(err: unknown, fields?: Record<string, unknown>): void;
};

export function beginRequestLog(base: Logger, context: Omit<LogContext, "requestId">, requestId?: string): RequestLog {
  const id = ensureRequestId(requestId);
  const log = childLogger({ ...context, requestId: id }, base);
  const startedAt = Date.now();
  const durationMs = () => Date.now() - startedAt;

  return {
    requestId: id,
    logger: log,
    start(fields = {}) {
      log.debug(fields, "weather.request.start");
    },
    succeed(fields = {}) {
      log.info({ ...fields, durationMs: durationMs() }, "weather.request.success");
    },
    fail(err, fields = {}) {
      log.warn({ ...fields, err: toErrorObject(err), durationMs: durationMs() }, "weather.request.failed");
    }
  };
}
