import { z } from "zod";
import { ConfigError } from "./errors";

const int = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1")
    .default(fallback ? "true" : "false");

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

/**
 * Environment variables understood by the api and worker processes.
 * Ranges follow what the delivery engine can sensibly honour.
 */
export const envSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SERVICE_VERSION: z.string().default("1.0.0"),

  API_PORT: int(1, 65535, 3000),
  API_KEY: optionalString,
  RATE_LIMIT_PER_SECOND: int(1, 10_000, 10),
  RATE_LIMIT_PER_MINUTE: int(1, 100_000, 60),

  PGHOST: z.string().default("localhost"),
  PGPORT: int(1, 65535, 5432),
  PGUSER: z.string().default("app"),
  PGPASSWORD: z.string().default("app"),
  PGDATABASE: z.string().default("app"),
  DB_POOL_MAX: int(1, 100, 10),
  DB_AUTO_MIGRATE: flag(false),
  STORE_RETRY_ATTEMPTS: int(1, 10, 3),

  WORKER_POLL_INTERVAL_MS: int(100, 3_600_000, 10_000),
  WORKER_BATCH_SIZE: int(1, 1000, 50),
  WORKER_CONCURRENCY: int(1, 100, 5),
  WORKER_GRACE_PERIOD_MS: int(0, 600_000, 30_000),
  WORKER_DELIVERY_TIMEOUT_MS: int(1000, 600_000, 30_000),
  EMAIL_RETRY_MAX_ATTEMPTS: int(1, 10, 3),
  EMAIL_RETRY_BACKOFF_SECONDS: int(60, 86_400, 300),

  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: int(1, 65535, 587),
  SMTP_SECURE: flag(false),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  SMTP_FROM_EMAIL: z.string().email().default("noreply@localhost.localdomain"),
  SMTP_FROM_NAME: z.string().default("Mail Queue"),

  TEMPLATE_DIR: z.string().min(1).default("templates"),
});

export type AppConfig = {
  logLevel: string;
  version: string;
  api: {
    port: number;
    apiKey?: string;
    rateLimit: { perSecond: number; perMinute: number };
  };
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    poolMax: number;
    autoMigrate: boolean;
    retryAttempts: number;
  };
  worker: {
    pollIntervalMs: number;
    batchSize: number;
    concurrency: number;
    gracePeriodMs: number;
    deliveryTimeoutMs: number;
  };
  retry: {
    maxRetries: number;
    baseBackoffSeconds: number;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user?: string;
    password?: string;
    from: { email: string; name: string };
  };
  templates: {
    dir: string;
  };
};

/** Injection token for the parsed {@link AppConfig}. */
export const APP_CONFIG = Symbol("APP_CONFIG");

/**
 * Parses the environment into an {@link AppConfig}.
 * Throws ConfigError listing every invalid variable at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const e = result.data;
  return Object.freeze({
    logLevel: e.LOG_LEVEL,
    version: e.SERVICE_VERSION,
    api: {
      port: e.API_PORT,
      apiKey: e.API_KEY,
      rateLimit: {
        perSecond: e.RATE_LIMIT_PER_SECOND,
        perMinute: e.RATE_LIMIT_PER_MINUTE,
      },
    },
    database: {
      host: e.PGHOST,
      port: e.PGPORT,
      user: e.PGUSER,
      password: e.PGPASSWORD,
      database: e.PGDATABASE,
      poolMax: e.DB_POOL_MAX,
      autoMigrate: e.DB_AUTO_MIGRATE,
      retryAttempts: e.STORE_RETRY_ATTEMPTS,
    },
    worker: {
      pollIntervalMs: e.WORKER_POLL_INTERVAL_MS,
      batchSize: e.WORKER_BATCH_SIZE,
      concurrency: e.WORKER_CONCURRENCY,
      gracePeriodMs: e.WORKER_GRACE_PERIOD_MS,
      deliveryTimeoutMs: e.WORKER_DELIVERY_TIMEOUT_MS,
    },
    retry: {
      maxRetries: e.EMAIL_RETRY_MAX_ATTEMPTS,
      baseBackoffSeconds: e.EMAIL_RETRY_BACKOFF_SECONDS,
    },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      secure: e.SMTP_SECURE,
      user: e.SMTP_USER,
      password: e.SMTP_PASSWORD,
      from: { email: e.SMTP_FROM_EMAIL, name: e.SMTP_FROM_NAME },
    },
    templates: {
      dir: e.TEMPLATE_DIR,
    },
  });
}
