import pino from "pino";

/**
 * Minimal structured logger for the whole system.
 * Do not put domain-specific logging helpers here.
 */
export const logger = pino({
  level:
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === "test" ? "silent" : "info"),
  base: undefined
});

export type Logger = typeof logger;
