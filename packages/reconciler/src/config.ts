/**
 * Runtime configuration.
 *
 * Values come from the environment (optionally seeded from a .env file)
 * and are validated once at startup. CLI flags override individual values
 * after loading.
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const DEFAULT_DATAMALL_BASE_URL =
  "https://datamall2.mytransport.sg/ltaodataservice";
const DEFAULT_SIMPLYGO_URL =
  "https://svc.simplygo.com.sg/eservice/eguide/bscode_idx.php";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

const envSchema = z.object({
  DATAMALL_API_KEY: optionalString,
  DATAMALL_BASE_URL: z.string().url().default(DEFAULT_DATAMALL_BASE_URL),
  SIMPLYGO_URL: z.string().url().default(DEFAULT_SIMPLYGO_URL),
  DATA_DIR: z.string().min(1).default("data"),
  OUTPUT_DIR: z.string().min(1).default("output"),
  LOOKUP_WORKERS: positiveInt(4),
  CHECKPOINT_BATCH_SIZE: positiveInt(20),
  CHECKPOINT_INTERVAL_MS: positiveInt(5 * 60_000),
  LOOKUP_TIMEOUT_MS: positiveInt(60_000),
  LOOKUP_MAX_ATTEMPTS: positiveInt(1),
  LOOKUP_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SLACK_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
});

export interface SyncConfig {
  datamall: {
    apiKey: string | undefined;
    baseUrl: string;
  };
  simplygo: {
    url: string;
    requestDelayMs: number;
  };
  storage: {
    dataDir: string;
    outputDir: string;
  };
  enrichment: {
    workers: number;
    batchSize: number;
    checkpointIntervalMs: number;
    timeoutMs: number;
    maxAttempts: number;
  };
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  slackWebhookUrl: string | undefined;
}

/**
 * Load a .env file into process.env. Variables already set win.
 * A missing file is not an error.
 */
export function loadEnvFile(path?: string): void {
  loadDotenv(path ? { path } : {});
}

/**
 * Validate environment variables into a SyncConfig.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  return {
    datamall: {
      apiKey: vars.DATAMALL_API_KEY,
      baseUrl: vars.DATAMALL_BASE_URL,
    },
    simplygo: {
      url: vars.SIMPLYGO_URL,
      requestDelayMs: vars.LOOKUP_REQUEST_DELAY_MS,
    },
    storage: {
      dataDir: vars.DATA_DIR,
      outputDir: vars.OUTPUT_DIR,
    },
    enrichment: {
      workers: vars.LOOKUP_WORKERS,
      batchSize: vars.CHECKPOINT_BATCH_SIZE,
      checkpointIntervalMs: vars.CHECKPOINT_INTERVAL_MS,
      timeoutMs: vars.LOOKUP_TIMEOUT_MS,
      maxAttempts: vars.LOOKUP_MAX_ATTEMPTS,
    },
    logLevel: vars.LOG_LEVEL,
    slackWebhookUrl: vars.SLACK_WEBHOOK_URL,
  };
}
