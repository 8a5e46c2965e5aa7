/**
 * Enrichment scheduler.
 *
 * Runs lookups for a work list on a fixed pool of async workers. Workers
 * share one cursor over the items, so each item is dispatched at most once,
 * and run one lookup at a time, so in-flight lookups never exceed the
 * concurrency. A failing item becomes a failed result; it never stops its
 * siblings.
 */

import type {
  ComparedSnapshots,
  EnrichmentResult,
  WorkItem,
} from "@stop-sync/types";
import { LookupFailure, LookupTimeoutError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { ResultAggregator, type CheckpointSink } from "./aggregator.js";
import type { LookupOutcome, NameLookup } from "./provider.js";

export interface EnrichmentOptions {
  /** Number of concurrent workers */
  concurrency: number;
  /** Checkpoint after this many completed items */
  batchSize: number;
  /** Per-attempt time budget. Default: none */
  timeoutMs?: number;
  /** Attempts per item, including the first. Default: 1 */
  maxAttempts?: number;
  /** Stops dispatching new items when aborted */
  signal?: AbortSignal;
  /** Identifies the run in checkpoints. Default: "adhoc" */
  runId?: string;
  checkpoint?: CheckpointSink;
  checkpointIntervalMs?: number;
  /** Snapshot labels written into each checkpoint */
  snapshots?: ComparedSnapshots;
  /** Results from an earlier run; kept but not dispatched again */
  seed?: readonly EnrichmentResult[];
  now?: () => number;
  logger?: Logger;
}

export interface EnrichmentRun {
  /** Seeded results first, then completion order */
  results: readonly EnrichmentResult[];
  /** Items handed to a worker in this run */
  dispatched: number;
  successCount: number;
  failureCount: number;
  cancelled: boolean;
  checkpointsWritten: number;
  checkpointFailures: number;
  durationMs: number;
}

function assertPositiveInteger(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/** The numeric settings `runEnrichment` accepts */
export type EnrichmentLimits = Pick<
  EnrichmentOptions,
  "concurrency" | "batchSize" | "timeoutMs" | "maxAttempts" | "checkpointIntervalMs"
>;

/**
 * @throws RangeError when a numeric setting is not a positive integer
 */
export function validateEnrichmentLimits(limits: EnrichmentLimits): void {
  assertPositiveInteger("concurrency", limits.concurrency);
  assertPositiveInteger("batchSize", limits.batchSize);
  assertPositiveInteger("maxAttempts", limits.maxAttempts);
  assertPositiveInteger("timeoutMs", limits.timeoutMs);
  assertPositiveInteger("checkpointIntervalMs", limits.checkpointIntervalMs);
}

/**
 * Look up every work item with bounded concurrency.
 *
 * @throws RangeError for a non-positive concurrency, batchSize, maxAttempts,
 *   timeoutMs or checkpointIntervalMs
 */
export async function runEnrichment(
  items: readonly WorkItem[],
  lookup: NameLookup,
  options: EnrichmentOptions
): Promise<EnrichmentRun> {
  validateEnrichmentLimits(options);
  const maxAttempts = options.maxAttempts ?? 1;

  const now = options.now ?? Date.now;
  const log = (options.logger ?? silentLogger).child({
    component: "scheduler",
  });
  const startedAt = now();

  const aggregator = new ResultAggregator({
    runId: options.runId ?? "adhoc",
    items,
    batchSize: options.batchSize,
    checkpointIntervalMs: options.checkpointIntervalMs,
    sink: options.checkpoint,
    snapshots: options.snapshots,
    seed: options.seed,
    now,
    logger: options.logger,
  });

  if (items.length === 0) {
    return summarize(aggregator, 0, false, 0);
  }

  const { signal } = options;
  const workerCount = Math.min(options.concurrency, items.length);
  let cursor = 0;
  let dispatched = 0;

  log.info(
    { items: items.length, workers: workerCount, maxAttempts },
    `Looking up ${items.length} stops with ${lookup.name}`
  );

  const worker = async (): Promise<void> => {
    while (!signal?.aborted) {
      const item = items[cursor++];
      if (!item) return;
      dispatched++;
      const result = await lookupItem(item, lookup, {
        maxAttempts,
        timeoutMs: options.timeoutMs,
        signal,
        log,
      });
      aggregator.add(result);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const cancelled = dispatched < items.length;
  if (cancelled) {
    log.warn(
      { dispatched, skipped: items.length - dispatched },
      "Enrichment cancelled; in-flight lookups finished"
    );
  }

  await aggregator.finish();
  const run = summarize(aggregator, dispatched, cancelled, now() - startedAt);

  log.info(
    {
      dispatched: run.dispatched,
      success: run.successCount,
      failed: run.failureCount,
      checkpoints: run.checkpointsWritten,
      checkpointFailures: run.checkpointFailures,
      durationMs: run.durationMs,
    },
    "Enrichment finished"
  );
  return run;
}

function summarize(
  aggregator: ResultAggregator,
  dispatched: number,
  cancelled: boolean,
  durationMs: number
): EnrichmentRun {
  const results = aggregator.results;
  const successCount = results.filter((r) => r.success).length;
  return {
    results,
    dispatched,
    successCount,
    failureCount: results.length - successCount,
    cancelled,
    checkpointsWritten: aggregator.checkpointsWritten,
    checkpointFailures: aggregator.checkpointFailures,
    durationMs,
  };
}

// ---------------------------------------------------------------------------
// Per-item execution
// ---------------------------------------------------------------------------

interface ItemContext {
  maxAttempts: number;
  timeoutMs: number | undefined;
  signal: AbortSignal | undefined;
  log: Logger;
}

async function lookupItem(
  item: WorkItem,
  lookup: NameLookup,
  ctx: ItemContext
): Promise<EnrichmentResult> {
  let lastError = "";
  let attempts = 0;

  while (attempts < ctx.maxAttempts) {
    attempts++;
    try {
      const outcome = await attemptLookup(item.code, lookup, ctx.timeoutMs);
      const result = toResult(item.code, outcome, attempts);
      ctx.log.debug(
        { code: item.code, reason: item.reason, attempts },
        "Lookup succeeded"
      );
      return result;
    } catch (err) {
      lastError = errorMessage(err);
      ctx.log.debug(
        { code: item.code, attempt: attempts, error: lastError },
        "Lookup attempt failed"
      );
    }
    // No retries once shutdown has been requested
    if (ctx.signal?.aborted) break;
  }

  ctx.log.warn(
    { code: item.code, reason: item.reason, attempts, error: lastError },
    "Lookup failed"
  );
  return { code: item.code, success: false, error: lastError, attempts };
}

async function attemptLookup(
  code: string,
  lookup: NameLookup,
  timeoutMs: number | undefined
): Promise<LookupOutcome> {
  if (timeoutMs === undefined) {
    return lookup.fetch(code, {});
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new LookupTimeoutError(code, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      lookup.fetch(code, { signal: controller.signal }),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/** Turn an outcome into a successful result, or throw why it is not one */
function toResult(
  code: string,
  outcome: LookupOutcome,
  attempts: number
): EnrichmentResult {
  if (!outcome.success) {
    throw new LookupFailure(code, outcome.error ?? "Lookup found no data");
  }
  const correctedName = outcome.correctedName?.trim() ?? "";
  const street = outcome.street?.trim() ?? "";
  if (!correctedName && !street) {
    throw new LookupFailure(code, "Lookup returned an empty result");
  }
  return {
    code,
    success: true,
    ...(correctedName ? { correctedName } : {}),
    ...(street ? { street } : {}),
    attempts,
  };
}
