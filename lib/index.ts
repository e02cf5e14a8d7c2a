export * from "./weather";
export { clientFromEnv, createEnv } from "./config/env";
export type { Env } from "./config/env";
export { logger } from "./logging";
