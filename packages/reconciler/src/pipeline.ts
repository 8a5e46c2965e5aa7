/**
 * Reconciliation pipeline.
 *
 * fetch catalog → normalize → load previous snapshot → persist snapshot →
 * diff → persist change report → select targets → enrich → merge →
 * persist final records
 *
 * A resumed run replaces the first four steps by reloading the snapshots
 * named in its checkpoint.
 *
 * Only SourceUnavailableError escapes once the run has started; lookup and
 * checkpoint failures are folded into the summary.
 */

import type {
  CheckpointState,
  EnrichmentResult,
  RawCatalog,
  RunSummary,
  Snapshot,
} from "@stop-sync/types";
import { diffSnapshots } from "./diff/diff.js";
import { logChangeReport } from "./diff/report-log.js";
import type { NameLookup } from "./enrichment/provider.js";
import { countCorrections, mergeRecords } from "./enrichment/merge.js";
import {
  runEnrichment,
  validateEnrichmentLimits,
  type EnrichmentRun,
} from "./enrichment/scheduler.js";
import { selectTargets, validateLimit } from "./enrichment/selector.js";
import { SourceUnavailableError, SyncError, errorMessage } from "./errors.js";
import type { CatalogSource } from "./ingestion/source.js";
import { silentLogger, type Logger } from "./logger.js";
import { buildSnapshot } from "./normalize/snapshot.js";
import type { SnapshotStore } from "./storage/store.js";

export interface SyncDependencies {
  catalog: CatalogSource;
  store: SnapshotStore;
  lookup: NameLookup;
  logger?: Logger;
  /** Clock for run ids and durations. Default: the system clock */
  now?: () => Date;
}

export interface SyncOptions {
  /** Concurrent lookups */
  concurrency: number;
  /** Checkpoint after this many lookups */
  batchSize: number;
  /** Look up at most this many stops */
  limit?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  checkpointIntervalMs?: number;
  /** Stops dispatching lookups when aborted */
  signal?: AbortSignal;
  /** Date the snapshot is filed under. Default: now */
  runDate?: Date;
  /** Run id or location of a checkpoint to continue from */
  resumeFrom?: string;
}

const SAMPLE_CORRECTIONS = 5;

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** YYYYMMDD in UTC */
export function formatDateLabel(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate())
  );
}

/** YYYYMMDD_HHMMSS in UTC */
export function formatRunId(date: Date): string {
  return (
    `${formatDateLabel(date)}_` +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Run one full reconciliation.
 *
 * With `resumeFrom`, the run continues the interrupted one: it reloads the
 * two snapshots that run compared instead of fetching the catalog, and only
 * looks up the codes its checkpoint has no result for.
 *
 * @throws RangeError for invalid numeric options, before anything is read
 *   or written
 * @throws SourceUnavailableError when the catalog, the previous snapshot or
 *   a resumed run's snapshots cannot be read; nothing is persisted in that
 *   case
 */
export async function runSync(
  deps: SyncDependencies,
  options: SyncOptions
): Promise<RunSummary> {
  validateLimit(options.limit);
  validateEnrichmentLimits(options);

  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? silentLogger;
  const log = logger.child({ component: "pipeline" });
  const startedAt = now();
  const runDate = options.runDate ?? startedAt;

  // Resumed runs keep their id so checkpoints keep landing in the same place
  const resumed = options.resumeFrom
    ? await deps.store.loadCheckpoint(options.resumeFrom)
    : null;
  const runId = resumed?.runId ?? formatRunId(runDate);

  let previous: Snapshot | null;
  let current: Snapshot;
  if (resumed) {
    ({ previous, current } = await reloadComparison(deps.store, resumed));
    log.info(
      { runId, previous: previous?.label ?? null, current: current.label },
      "Resuming stop sync"
    );
  } else {
    const label = formatDateLabel(runDate);
    log.info({ runId, label }, "Starting stop sync");
    current = await fetchSnapshot(deps.catalog, label, logger);
    previous = await deps.store.findPrevious(label);
    await deps.store.persistSnapshot(current, label);
  }

  const report = diffSnapshots(previous, current);
  // The interrupted run already filed its change report
  if (!resumed) {
    await deps.store.persistChangeReport(report, {
      previous: report.previousLabel,
      current: report.currentLabel,
    });
  }
  logChangeReport(report, logger);

  const targetCodes = new Set(selectTargets(report).map((t) => t.code));
  const seed = (resumed?.results ?? []).filter((r) => targetCodes.has(r.code));
  const items = selectTargets(report, {
    limit: options.limit,
    exclude: new Set(seed.map((r) => r.code)),
  });

  if (seed.length > 0) {
    log.info(
      { resumed: seed.length, remaining: items.length },
      "Continuing from checkpoint"
    );
  }

  const run =
    items.length > 0
      ? await runEnrichment(items, deps.lookup, {
          concurrency: options.concurrency,
          batchSize: options.batchSize,
          timeoutMs: options.timeoutMs,
          maxAttempts: options.maxAttempts,
          checkpointIntervalMs: options.checkpointIntervalMs,
          signal: options.signal,
          runId,
          snapshots: {
            previousLabel: report.previousLabel,
            currentLabel: report.currentLabel,
          },
          checkpoint: async (state) => {
            await deps.store.persistCheckpoint(state);
          },
          seed,
          logger,
        })
      : skippedRun(seed);

  const records = mergeRecords(current, run.results);
  await deps.store.persistFinal(records, runId);

  const corrections = records.filter(
    (r) => r.nameSource === "Enriched" && r.correctedName !== r.name
  );
  if (corrections.length > 0) {
    log.info(
      {
        samples: corrections
          .slice(0, SAMPLE_CORRECTIONS)
          .map((r) => `${r.code}: ${r.name} → ${r.correctedName}`),
      },
      `${corrections.length} names differ from the catalog`
    );
  }

  const summary: RunSummary = {
    runId,
    previousLabel: report.previousLabel,
    currentLabel: report.currentLabel,
    totalCurrent: report.counts.totalCurrent,
    totalPrevious: report.counts.totalPrevious,
    newCount: report.counts.newCount,
    removedCount: report.counts.removedCount,
    nameChangedCount: report.counts.nameChangedCount,
    enrichedCount: run.results.length,
    enrichmentSuccessCount: run.successCount,
    enrichmentFailureCount: run.failureCount,
    correctionsApplied: countCorrections(records),
    cancelled: run.cancelled,
    checkpointFailures: run.checkpointFailures,
    durationMs: now().getTime() - startedAt.getTime(),
  };

  log.info(summary, "Stop sync finished");
  return summary;
}

async function fetchSnapshot(
  catalog: CatalogSource,
  label: string,
  logger: Logger
): Promise<Snapshot> {
  let raw: RawCatalog;
  try {
    raw = await catalog.fetchCurrent();
  } catch (err) {
    if (err instanceof SyncError) throw err;
    throw new SourceUnavailableError(
      `${catalog.name} failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const { snapshot, issues } = buildSnapshot(raw.rows, {
    label,
    capturedAt: raw.fetchedAt,
    logger,
  });
  if (snapshot.records.length === 0) {
    throw new SourceUnavailableError(
      `${catalog.name} returned no valid records (${raw.rows.length} rows)`
    );
  }

  logger.child({ component: "pipeline" }).info(
    { rows: raw.rows.length, records: snapshot.records.length, ...issues },
    "Normalized current catalog"
  );
  return snapshot;
}

async function reloadComparison(
  store: SnapshotStore,
  checkpoint: CheckpointState
): Promise<{ previous: Snapshot | null; current: Snapshot }> {
  const { previousLabel, currentLabel } = checkpoint;
  if (currentLabel === undefined) {
    throw new SourceUnavailableError(
      `Checkpoint for run ${checkpoint.runId} does not name the snapshots it compared`
    );
  }
  return {
    previous: previousLabel ? await store.loadSnapshot(previousLabel) : null,
    current: await store.loadSnapshot(currentLabel),
  };
}

function skippedRun(seed: readonly EnrichmentResult[]): EnrichmentRun {
  const successCount = seed.filter((r) => r.success).length;
  return {
    results: seed,
    dispatched: 0,
    successCount,
    failureCount: seed.length - successCount,
    cancelled: false,
    checkpointsWritten: 0,
    checkpointFailures: 0,
    durationMs: 0,
  };
}
