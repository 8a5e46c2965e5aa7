/**
 * Snapshot store interface.
 *
 * Everything a run reads or writes goes through a store: dated catalog
 * snapshots, the change report, scheduler checkpoints and the final record
 * set. Persist methods resolve to the location written, for logging.
 */

import type {
  ChangeReport,
  CheckpointState,
  FinalRecord,
  Snapshot,
} from "@stop-sync/types";

/** Snapshot labels a change report is filed under */
export interface ReportLabels {
  previous: string | null;
  current: string;
}

export interface SnapshotStore {
  /**
   * Newest stored snapshot with a label earlier than `currentLabel`.
   * Resolves null when there is none (first run).
   * @throws SourceUnavailableError when that snapshot is empty or unreadable
   */
  findPrevious(currentLabel: string): Promise<Snapshot | null>;
  /**
   * Load the snapshot stored under `label`.
   * @throws SourceUnavailableError when it is missing, empty or unreadable
   */
  loadSnapshot(label: string): Promise<Snapshot>;
  persistSnapshot(snapshot: Snapshot, dateLabel: string): Promise<string>;
  persistChangeReport(report: ChangeReport, labels: ReportLabels): Promise<string>;
  persistCheckpoint(state: CheckpointState): Promise<string>;
  /**
   * Load a checkpoint by run id or location.
   * @throws SourceUnavailableError when it is missing or invalid
   */
  loadCheckpoint(ref: string): Promise<CheckpointState>;
  persistFinal(records: readonly FinalRecord[], runId: string): Promise<string>;
}

/** Pick the newest label that sorts before `currentLabel` */
export function previousLabel(
  labels: Iterable<string>,
  currentLabel: string
): string | null {
  let best: string | null = null;
  for (const label of labels) {
    if (label < currentLabel && (best === null || label > best)) {
      best = label;
    }
  }
  return best;
}
