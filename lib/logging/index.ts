export type { LogContext } from "./logger";
export { childLogger, ensureRequestId, logger, loggerOptions, redactionPaths, toErrorObject } from "./logger";
export type { RequestLog } from "./requestLog";
export { beginRequestLog } from "./requestLog";
