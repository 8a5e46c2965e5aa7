/**
 * Bus stop catalog sync.
 *
 * Downloads the current catalog, diffs it against the previous snapshot,
 * looks up names for new and renamed stops and writes the merged catalog.
 *
 * Usage: npx tsx scripts/sync-stops.ts [options]
 *
 * Configuration comes from the environment (or a .env file); flags
 * override it. Ctrl-C stops dispatching lookups, lets in-flight ones
 * finish and still writes the results.
 */
import { InvalidArgumentError, Option, program } from "commander";
import {
  ConfigError,
  SlackNotifier,
  createLogger,
  createSyncDependencies,
  errorMessage,
  loadConfig,
  loadEnvFile,
  runSync,
  successRate,
  type LogLevel,
  type Logger,
  type SyncConfig,
} from "../src/index.js";

// ── CLI ──────────────────────────────────────────────────────────────

interface CliOptions {
  apiKey?: string;
  workers?: number;
  batchSize?: number;
  limit?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  resume?: string;
  logLevel?: LogLevel;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

program
  .name("sync-stops")
  .description("Reconcile the bus stop catalog and enrich new and renamed stops")
  .option("--api-key <key>", "DataMall account key (default: $DATAMALL_API_KEY)")
  .option("--workers <n>", "concurrent lookups", positiveInt)
  .option("--batch-size <n>", "checkpoint after this many lookups", positiveInt)
  .option("--limit <n>", "look up at most this many stops", nonNegativeInt)
  .option("--timeout-ms <ms>", "time budget per lookup attempt", positiveInt)
  .option("--max-attempts <n>", "attempts per stop", positiveInt)
  .option("--resume <checkpoint>", "run id or path of a checkpoint to continue")
  .addOption(
    new Option("--log-level <level>", "log level").choices([
      "fatal",
      "error",
      "warn",
      "info",
      "debug",
      "trace",
      "silent",
    ])
  );

// ── Helpers ──────────────────────────────────────────────────────────

function pct(n: number, total: number): string {
  if (total === 0) return "0.0%";
  return ((n / total) * 100).toFixed(1) + "%";
}

function applyFlags(config: SyncConfig, opts: CliOptions): SyncConfig {
  return {
    ...config,
    datamall: { ...config.datamall, apiKey: opts.apiKey ?? config.datamall.apiKey },
    enrichment: {
      ...config.enrichment,
      workers: opts.workers ?? config.enrichment.workers,
      batchSize: opts.batchSize ?? config.enrichment.batchSize,
      timeoutMs: opts.timeoutMs ?? config.enrichment.timeoutMs,
      maxAttempts: opts.maxAttempts ?? config.enrichment.maxAttempts,
    },
    logLevel: opts.logLevel ?? config.logLevel,
  };
}

function onShutdown(controller: AbortController, logger: Logger): void {
  const stop = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.warn({ signal }, "Shutdown requested; finishing in-flight lookups");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

// ── Main ─────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  loadEnvFile();
  program.parse();
  const opts = program.opts<CliOptions>();

  let config: SyncConfig;
  try {
    config = applyFlags(loadConfig(process.env), opts);
  } catch (err) {
    createLogger({ level: opts.logLevel ?? "info" }).fatal({ err }, errorMessage(err));
    return 1;
  }

  const logger = createLogger({ level: config.logLevel });
  const notifier = config.slackWebhookUrl
    ? new SlackNotifier({ webhookUrl: config.slackWebhookUrl, logger })
    : null;
  const controller = new AbortController();
  onShutdown(controller, logger);

  try {
    const deps = createSyncDependencies(config, logger);
    await notifier?.notifyStart(
      opts.resume ? `resuming ${opts.resume}` : new Date().toISOString()
    );

    const summary = await runSync(deps, {
      concurrency: config.enrichment.workers,
      batchSize: config.enrichment.batchSize,
      limit: opts.limit,
      timeoutMs: config.enrichment.timeoutMs,
      maxAttempts: config.enrichment.maxAttempts,
      checkpointIntervalMs: config.enrichment.checkpointIntervalMs,
      signal: controller.signal,
      resumeFrom: opts.resume,
    });

    logger.info(
      {
        runId: summary.runId,
        totalStops: summary.totalCurrent,
        corrections: summary.correctionsApplied,
        correctionRate: pct(summary.correctionsApplied, summary.totalCurrent),
        lookupSuccessRate: `${successRate(summary).toFixed(1)}%`,
        new: summary.newCount,
        renamed: summary.nameChangedCount,
        removed: summary.removedCount,
        checkpointFailures: summary.checkpointFailures,
        cancelled: summary.cancelled,
        durationMs: summary.durationMs,
      },
      "Final statistics"
    );
    await notifier?.notifyCompletion(summary);
    return 0;
  } catch (err) {
    logger.fatal({ err }, err instanceof ConfigError ? err.message : `Sync failed: ${errorMessage(err)}`);
    await notifier?.notifyFailure(err);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
