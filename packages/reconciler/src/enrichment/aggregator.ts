/**
 * Result aggregator.
 *
 * The single owner of a run's enrichment results. Workers hand each result
 * to `add()`; the aggregator decides when to checkpoint and serializes the
 * writes so at most one is in flight and they land in order.
 */

import type {
  CheckpointState,
  ComparedSnapshots,
  EnrichmentResult,
  WorkItem,
} from "@stop-sync/types";
import { CheckpointWriteError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

/** Persists a checkpoint; rejects when the write fails */
export type CheckpointSink = (state: CheckpointState) => Promise<void>;

export interface ResultAggregatorOptions {
  runId: string;
  /** Every item of the run, including ones already resolved by `seed` */
  items: readonly WorkItem[];
  /** Checkpoint after this many new results */
  batchSize: number;
  /** Also checkpoint when this much time has passed since the last one */
  checkpointIntervalMs?: number;
  sink?: CheckpointSink;
  /** Recorded in every checkpoint so a resume can rebuild the work list */
  snapshots?: ComparedSnapshots;
  /** Results carried over from an earlier, interrupted run */
  seed?: readonly EnrichmentResult[];
  now?: () => number;
  logger?: Logger;
}

export class ResultAggregator {
  private readonly runId: string;
  private readonly codes: readonly string[];
  private readonly batchSize: number;
  private readonly checkpointIntervalMs: number | undefined;
  private readonly sink: CheckpointSink | undefined;
  private readonly snapshots: ComparedSnapshots | undefined;
  private readonly now: () => number;
  private readonly log: Logger;

  private readonly collected: EnrichmentResult[];
  private sinceCheckpoint = 0;
  private lastCheckpointAt: number;
  private lastCheckpointSize: number;
  private writes: Promise<void> = Promise.resolve();
  private written = 0;
  private failed = 0;

  constructor(options: ResultAggregatorOptions) {
    this.runId = options.runId;
    this.batchSize = options.batchSize;
    this.checkpointIntervalMs = options.checkpointIntervalMs;
    this.sink = options.sink;
    this.snapshots = options.snapshots;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? silentLogger).child({
      component: "aggregator",
    });

    this.collected = [...(options.seed ?? [])];
    const codes = new Set(this.collected.map((r) => r.code));
    for (const item of options.items) codes.add(item.code);
    this.codes = [...codes];

    this.lastCheckpointAt = this.now();
    this.lastCheckpointSize = this.collected.length;
  }

  /** Results in completion order, seeded results first */
  get results(): readonly EnrichmentResult[] {
    return [...this.collected];
  }

  get checkpointsWritten(): number {
    return this.written;
  }

  get checkpointFailures(): number {
    return this.failed;
  }

  add(result: EnrichmentResult): void {
    this.collected.push(result);
    this.sinceCheckpoint++;

    const batchDue = this.sinceCheckpoint >= this.batchSize;
    const intervalDue =
      this.checkpointIntervalMs !== undefined &&
      this.now() - this.lastCheckpointAt >= this.checkpointIntervalMs;

    if (batchDue || intervalDue) {
      this.checkpoint();
    }
  }

  /** Current progress as a persistable state */
  snapshot(): CheckpointState {
    const completed = this.collected.map((r) => r.code);
    const done = new Set(completed);
    return {
      runId: this.runId,
      savedAt: new Date(this.now()).toISOString(),
      ...this.snapshots,
      total: this.codes.length,
      completed,
      remaining: this.codes.filter((code) => !done.has(code)),
      results: this.collected.map((r) => ({ ...r })),
    };
  }

  /** Queue a checkpoint of the current state behind any pending write */
  checkpoint(): void {
    this.sinceCheckpoint = 0;
    this.lastCheckpointAt = this.now();
    this.lastCheckpointSize = this.collected.length;

    const sink = this.sink;
    if (!sink) return;

    const state = this.snapshot();
    this.writes = this.writes.then(() => this.write(sink, state));
  }

  /**
   * Write a last checkpoint if anything changed since the previous one,
   * then wait for every queued write.
   */
  async finish(): Promise<void> {
    if (this.collected.length !== this.lastCheckpointSize) {
      this.checkpoint();
    }
    await this.writes;
  }

  private async write(sink: CheckpointSink, state: CheckpointState): Promise<void> {
    try {
      await sink(state);
      this.written++;
      this.log.info(
        {
          completed: state.completed.length,
          remaining: state.remaining.length,
          total: state.total,
        },
        "Checkpoint saved"
      );
    } catch (err) {
      this.failed++;
      const error = new CheckpointWriteError(
        `Failed to write checkpoint for run ${state.runId}: ${errorMessage(err)}`,
        { cause: err }
      );
      this.log.error({ err: error }, "Checkpoint write failed; continuing");
    }
  }
}
