import crypto from "node:crypto";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions, type TransportSingleOptions } from "pino";

export type LogContext = {
  requestId?: string;
  component?: string;
  lookup?: string;
  units?: string;
};

// APPID is the query parameter name the key travels under.
export const redactionPaths = ["apiKey", "APPID", "appid", "*.apiKey", "*.APPID", "*.appid"];

// Pretty output in development or on request; plain JSON lines under production and tests.
function prettyTransport(env: NodeJS.ProcessEnv): TransportSingleOptions | undefined {
  const quiet = env["NODE_ENV"] === "production" || env["NODE_ENV"] === "test";
  if (quiet && env["LOG_PRETTY"] !== "true") return undefined;
  return { target: "pino-pretty", options: { colorize: true, singleLine: true, ignore: "pid,hostname" } };
}

export function loggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  return {
    level: env["LOG_LEVEL"] ?? "info",
    base: { service: env["SERVICE_NAME"] ?? "openweathermap-client" },
    redact: { paths: redactionPaths, censor: "[redacted]" },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: stdTimeFunctions.isoTime,
    transport: prettyTransport(env)
  };
}

export const logger = pino(loggerOptions());

export function childLogger(context: LogContext, base: Logger = logger): Logger {
  const bindings: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (typeof value === "string" && value.length > 0) bindings[key] = value;
  }
  return Object.keys(bindings).length ? base.child(bindings) : base;
}

export function ensureRequestId(existing?: string): string {
  return existing || crypto.randomUUID();
}

export function toErrorObject(err: unknown): { message: string; name?: string; stack?: string } {
  if (err instanceof Error) return { message: err.message, name: err.name, stack: err.stack };
  if (typeof err === "string") return { message: err };
  return { message: JSON.stringify(err) };
}
