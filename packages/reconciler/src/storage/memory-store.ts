import type {
  ChangeReport,
  CheckpointState,
  FinalRecord,
  Snapshot,
} from "@stop-sync/types";
import { SourceUnavailableError } from "../errors.js";
import { previousLabel, type ReportLabels, type SnapshotStore } from "./store.js";

/**
 * In-memory snapshot store.
 *
 * Keeps everything it is given, including every checkpoint in write order,
 * so a caller can inspect what a run persisted.
 */
export class MemorySnapshotStore implements SnapshotStore {
  readonly snapshots = new Map<string, Snapshot>();
  readonly changeReports = new Map<string, ChangeReport>();
  readonly checkpoints: CheckpointState[] = [];
  readonly finals = new Map<string, readonly FinalRecord[]>();

  constructor(snapshots: readonly Snapshot[] = []) {
    for (const snapshot of snapshots) {
      this.snapshots.set(snapshot.label, snapshot);
    }
  }

  async findPrevious(currentLabel: string): Promise<Snapshot | null> {
    const label = previousLabel(this.snapshots.keys(), currentLabel);
    if (label === null) return null;
    const snapshot = this.snapshots.get(label);
    if (!snapshot || snapshot.records.length === 0) {
      throw new SourceUnavailableError(`Previous snapshot ${label} is empty`);
    }
    return snapshot;
  }

  async loadSnapshot(label: string): Promise<Snapshot> {
    const snapshot = this.snapshots.get(label);
    if (!snapshot || snapshot.records.length === 0) {
      throw new SourceUnavailableError(`Snapshot ${label} is missing or empty`);
    }
    return snapshot;
  }

  async persistSnapshot(snapshot: Snapshot, dateLabel: string): Promise<string> {
    this.snapshots.set(dateLabel, { ...snapshot, label: dateLabel });
    return `memory://snapshots/${dateLabel}`;
  }

  async persistChangeReport(report: ChangeReport, labels: ReportLabels): Promise<string> {
    const key = labels.previous === null ? labels.current : `${labels.previous}-${labels.current}`;
    this.changeReports.set(key, report);
    return `memory://changes/${key}`;
  }

  async persistCheckpoint(state: CheckpointState): Promise<string> {
    this.checkpoints.push(structuredClone(state));
    return `memory://checkpoints/${state.runId}`;
  }

  async loadCheckpoint(ref: string): Promise<CheckpointState> {
    const state = this.checkpoints.findLast((c) => c.runId === ref);
    if (!state) {
      throw new SourceUnavailableError(`No checkpoint for run ${ref}`);
    }
    return structuredClone(state);
  }

  async persistFinal(records: readonly FinalRecord[], runId: string): Promise<string> {
    this.finals.set(runId, [...records]);
    return `memory://finals/${runId}`;
  }
}
