/**
 * File-backed snapshot store.
 *
 * Layout:
 *   {dataDir}/bus_stops_{YYYYMMDD}.csv              catalog snapshots
 *   {dataDir}/changes_{prev}-{current}.csv          change reports
 *   {dataDir}/bus_stops_corrected_{runId}.csv       final records
 *   {dataDir}/bus_stops_corrected.csv               latest final records
 *   {outputDir}/progress_{runId}.json               checkpoints
 */

import { mkdir, readFile, readdir, rename, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  ChangeReport,
  CheckpointState,
  FinalRecord,
  RawStopRow,
  Snapshot,
} from "@stop-sync/types";
import { SourceUnavailableError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { buildSnapshot } from "../normalize/snapshot.js";
import { parseCheckpoint } from "./checkpoint.js";
import {
  decodeRows,
  encodeChangeReport,
  encodeFinalRecords,
  encodeSnapshot,
} from "./csv.js";
import { previousLabel, type ReportLabels, type SnapshotStore } from "./store.js";

const SNAPSHOT_FILE = /^bus_stops_(\d{8})\.csv$/;

export interface FileSnapshotStoreOptions {
  dataDir: string;
  outputDir: string;
  logger?: Logger;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileSnapshotStore implements SnapshotStore {
  readonly dataDir: string;
  readonly outputDir: string;
  private readonly logger: Logger;
  private readonly log: Logger;

  constructor(options: FileSnapshotStoreOptions) {
    this.dataDir = options.dataDir;
    this.outputDir = options.outputDir;
    this.logger = options.logger ?? silentLogger;
    this.log = this.logger.child({ component: "file-store" });
  }

  snapshotPath(label: string): string {
    return join(this.dataDir, `bus_stops_${label}.csv`);
  }

  checkpointPath(runId: string): string {
    return join(this.outputDir, `progress_${runId}.json`);
  }

  async findPrevious(currentLabel: string): Promise<Snapshot | null> {
    let entries: string[];
    try {
      entries = await readdir(this.dataDir);
    } catch (err) {
      if (isMissing(err)) return null;
      throw new SourceUnavailableError(
        `Cannot list ${this.dataDir}: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    const labels = entries.flatMap((name) => {
      const label = SNAPSHOT_FILE.exec(name)?.[1];
      return label ? [label] : [];
    });
    const label = previousLabel(labels, currentLabel);
    if (label === null) return null;

    const snapshot = await this.readSnapshot(label, "previous snapshot");
    this.log.info(
      { path: this.snapshotPath(label), records: snapshot.records.length },
      "Loaded previous snapshot"
    );
    return snapshot;
  }

  async loadSnapshot(label: string): Promise<Snapshot> {
    return this.readSnapshot(label, "snapshot");
  }

  private async readSnapshot(label: string, kind: string): Promise<Snapshot> {
    const path = this.snapshotPath(label);
    let text: string;
    let modifiedAt: Date;
    try {
      text = await readFile(path, "utf8");
      modifiedAt = (await stat(path)).mtime;
    } catch (err) {
      throw new SourceUnavailableError(
        `Cannot read ${kind} ${path}: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    let rows: RawStopRow[];
    try {
      rows = decodeRows(text);
    } catch (err) {
      throw new SourceUnavailableError(
        `${capitalize(kind)} ${path} is not valid CSV: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    const { snapshot } = buildSnapshot(rows, {
      label,
      capturedAt: modifiedAt,
      logger: this.logger,
    });
    if (snapshot.records.length === 0) {
      throw new SourceUnavailableError(
        `${capitalize(kind)} ${path} has no valid records`
      );
    }
    return snapshot;
  }

  async persistSnapshot(snapshot: Snapshot, dateLabel: string): Promise<string> {
    const path = this.snapshotPath(dateLabel);
    await this.write(this.dataDir, path, encodeSnapshot(snapshot.records));
    this.log.info({ path, records: snapshot.records.length }, "Saved snapshot");
    return path;
  }

  async persistChangeReport(report: ChangeReport, labels: ReportLabels): Promise<string> {
    const name =
      labels.previous === null
        ? `changes_${labels.current}.csv`
        : `changes_${labels.previous}-${labels.current}.csv`;
    const path = join(this.dataDir, name);
    await this.write(this.dataDir, path, encodeChangeReport(report));
    this.log.info({ path, changes: report.entries.length }, "Saved change report");
    return path;
  }

  async persistCheckpoint(state: CheckpointState): Promise<string> {
    const path = this.checkpointPath(state.runId);
    const tmp = `${path}.tmp`;
    await this.write(this.outputDir, tmp, JSON.stringify(state, null, 2));
    await rename(tmp, path);
    return path;
  }

  async loadCheckpoint(ref: string): Promise<CheckpointState> {
    const path = ref.endsWith(".json") ? ref : this.checkpointPath(ref);
    try {
      const state = parseCheckpoint(JSON.parse(await readFile(path, "utf8")));
      this.log.info(
        { path, completed: state.completed.length, remaining: state.remaining.length },
        "Loaded checkpoint"
      );
      return state;
    } catch (err) {
      throw new SourceUnavailableError(
        `Cannot load checkpoint ${path}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  async persistFinal(records: readonly FinalRecord[], runId: string): Promise<string> {
    const csv = encodeFinalRecords(records);
    const path = join(this.dataDir, `bus_stops_corrected_${runId}.csv`);
    await this.write(this.dataDir, path, csv);
    await writeFile(join(this.dataDir, "bus_stops_corrected.csv"), csv, "utf8");
    this.log.info({ path, records: records.length }, "Saved final records");
    return path;
  }

  private async write(dir: string, path: string, contents: string): Promise<void> {
    await mkdir(dir, { recursive: true });
    await writeFile(path, contents, "utf8");
  }
}
