import { Writable } from "node:stream";

import pino, { stdTimeFunctions } from "pino";
import { describe, expect, it } from "vitest";

import {
  beginRequestLog,
  childLogger,
  ensureRequestId,
  loggerOptions,
  redactionPaths,
  toErrorObject
} from "../lib/logging";

function capture(level = "debug") {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _enc, cb) {
      lines.push(String(chunk));
      cb();
    }
  });
  const log = pino(
    { level, base: {}, redact: { paths: redactionPaths, censor: "[redacted]" }, timestamp: stdTimeFunctions.mockTime },
    stream
  );
  const entries = (): Array<Record<string, unknown>> =>
    lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { log, entries };
}

describe("loggerOptions", () => {
  it("writes plain json under test and production", () => {
    expect(loggerOptions({ NODE_ENV: "test" }).transport).toBeUndefined();
    expect(loggerOptions({ NODE_ENV: "production" }).transport).toBeUndefined();
  });

  it("uses pino-pretty in development or when forced", () => {
    expect(loggerOptions({}).transport).toMatchObject({ target: "pino-pretty" });
    expect(loggerOptions({ NODE_ENV: "test", LOG_PRETTY: "true" }).transport).toMatchObject({ target: "pino-pretty" });
  });

  it("reads level and service name from the environment", () => {
    const options = loggerOptions({ NODE_ENV: "test", LOG_LEVEL: "warn", SERVICE_NAME: "station-sync" });
    expect(options.level).toBe("warn");
    expect(options.base).toEqual({ service: "station-sync" });
  });
});

describe("logging helpers", () => {
  it("binds only non-empty context values", () => {
    const base = pino({ base: {} });
    const log = childLogger({ requestId: "req-1", lookup: "city", units: "" }, base);
    expect(log.bindings()).toEqual({ requestId: "req-1", lookup: "city" });
    expect(childLogger({ units: undefined }, base)).toBe(base);
  });

  it("redacts api keys", () => {
    const { log, entries } = capture();
    log.info({ APPID: "secret-app-id", config: { apiKey: "secret-key" } }, "sensitive");
    const [logged] = entries();
    expect(logged?.["APPID"]).toBe("[redacted]");
    expect(logged?.["config"]).toEqual({ apiKey: "[redacted]" });
  });

  it("keeps an existing request id and generates one otherwise", () => {
    expect(ensureRequestId("abc")).toBe("abc");
    expect(ensureRequestId("")).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it("normalizes errors", () => {
    expect(toErrorObject(new TypeError("boom"))).toMatchObject({ message: "boom", name: "TypeError" });
    expect(toErrorObject("oops")).toEqual({ message: "oops" });
    expect(toErrorObject({ code: 1 })).toEqual({ message: '{"code":1}' });
  });
});

describe("beginRequestLog", () => {
  it("logs start and success under one request id", () => {
    const { log, entries } = capture();
    const request = beginRequestLog(log, { component: "openweathermap", lookup: "zip" }, "req-7");

    request.start({ host: "api.openweathermap.org" });
    request.succeed({ status: 200 });

    expect(request.requestId).toBe("req-7");
    expect(entries()).toEqual([
      {
        level: 20,
        time: 1531117783,
        component: "openweathermap",
        lookup: "zip",
        requestId: "req-7",
        host: "api.openweathermap.org",
        msg: "weather.request.start"
      },
      {
        level: 30,
        time: 1531117783,
        component: "openweathermap",
        lookup: "zip",
        requestId: "req-7",
        status: 200,
        durationMs: expect.any(Number),
        msg: "weather.request.success"
      }
    ]);
  });

  it("logs failures at warn with the error", () => {
    const { log, entries } = capture("info");
    const request = beginRequestLog(log, { lookup: "id" });

    request.start();
    request.fail(new Error("socket closed"));

    const logged = entries();
    expect(logged).toHaveLength(1);
    expect(logged[0]).toMatchObject({
      level: 40,
      lookup: "id",
      requestId: request.requestId,
      msg: "weather.request.failed",
      err: { name: "Error", message: "socket closed" }
    });
  });
});
