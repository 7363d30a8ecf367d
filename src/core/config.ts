import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const envSchema = z.object({
  DATABASE_PATH: z.string().default("./data/quotaflow.db"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  DOWNLOAD_DIR: z.string().default("./downloads"),
  ROTATION_THRESHOLD: z.coerce.number().int().positive().default(10),
  MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().positive().default(3),
  AUTH_FAILURES_BEFORE_DISQUALIFY: z.coerce.number().int().positive().default(2),
  MAX_ATTEMPTS_PER_ITEM: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(30000),
  MIN_FILE_SIZE_BYTES: z.coerce.number().int().nonnegative().default(1000),
  MAX_FILE_SIZE_BYTES: z.coerce.number().int().positive().default(500 * 1024 * 1024),
  DOWNLOAD_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
  MAX_FILENAME_LENGTH: z.coerce.number().int().positive().default(160),
  DEFAULT_MAX_DAILY_DOWNLOADS: z.coerce.number().int().positive().default(10),
  REMOTE_LOGIN_URL: z.string().url().optional(),
  RUN_LOCK_TIMEOUT_SECONDS: z.coerce.number().default(3600),
});

export const env = envSchema.parse(process.env);

export interface EngineConfig {
  rotationThreshold: number;
  maxConsecutiveFailures: number;
  authFailuresBeforeDisqualify: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  minFileSizeBytes: number;
  maxFileSizeBytes: number;
  downloadDelayMs: number;
}

export function engineConfigFromEnv(): EngineConfig {
  return {
    rotationThreshold: env.ROTATION_THRESHOLD,
    maxConsecutiveFailures: env.MAX_CONSECUTIVE_FAILURES,
    authFailuresBeforeDisqualify: env.AUTH_FAILURES_BEFORE_DISQUALIFY,
    maxAttempts: env.MAX_ATTEMPTS_PER_ITEM,
    retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: env.RETRY_MAX_DELAY_MS,
    minFileSizeBytes: env.MIN_FILE_SIZE_BYTES,
    maxFileSizeBytes: env.MAX_FILE_SIZE_BYTES,
    downloadDelayMs: env.DOWNLOAD_DELAY_MS,
  };
}
