export { logger } from "./logger";
export type { Logger } from "./logger";
export { CLOCK, onShutdown, sleep, systemClock } from "./runtime";
export type { Clock } from "./runtime";
export { APP_CONFIG, envSchema, loadConfig } from "./config";
export type { AppConfig } from "./config";
export * from "./errors";
