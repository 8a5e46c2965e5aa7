/**
 * Snapshot building.
 *
 * Raw rows are validated here and nowhere else. Every later stage works on
 * StopRecords whose code is canonical and whose fields are typed.
 */

import type {
  NormalizationIssues,
  RawStopRow,
  Snapshot,
  StopRecord,
} from "@stop-sync/types";
import { silentLogger, type Logger } from "../logger.js";
import { tryNormalizeCode } from "./code.js";
import { stopRowSchema } from "./schema.js";

export interface BuildSnapshotOptions {
  /** Date label the snapshot is stored under */
  label: string;
  capturedAt?: Date;
  logger?: Logger;
}

export interface BuildSnapshotResult {
  snapshot: Snapshot;
  issues: NormalizationIssues;
}

const SAMPLE_LIMIT = 5;

/**
 * Validate raw rows into a snapshot ordered by code.
 *
 * Rows with a malformed code or invalid fields are dropped and counted.
 * When a code appears more than once the last occurrence wins.
 */
export function buildSnapshot(
  rows: readonly RawStopRow[],
  options: BuildSnapshotOptions
): BuildSnapshotResult {
  const log = (options.logger ?? silentLogger).child({
    component: "normalize",
  });
  const issues: NormalizationIssues = {
    malformedCodes: 0,
    invalidRows: 0,
    duplicateCodes: 0,
  };
  const malformedSamples: unknown[] = [];
  const duplicateSamples: string[] = [];
  const byCode = new Map<string, StopRecord>();

  rows.forEach((row, index) => {
    const code = tryNormalizeCode(row["code"]);
    if (code === null) {
      issues.malformedCodes++;
      if (malformedSamples.length < SAMPLE_LIMIT) {
        malformedSamples.push(row["code"]);
      }
      return;
    }

    const parsed = stopRowSchema.safeParse(row);
    if (!parsed.success) {
      issues.invalidRows++;
      log.warn(
        {
          row: index,
          code,
          issues: parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
          ),
        },
        "Quarantined invalid row"
      );
      return;
    }

    if (byCode.has(code)) {
      issues.duplicateCodes++;
      if (duplicateSamples.length < SAMPLE_LIMIT) {
        duplicateSamples.push(code);
      }
    }
    byCode.set(code, { code, ...parsed.data });
  });

  if (issues.malformedCodes > 0) {
    log.warn(
      { count: issues.malformedCodes, samples: malformedSamples },
      "Excluded rows with malformed stop codes"
    );
  }
  if (issues.duplicateCodes > 0) {
    log.warn(
      { count: issues.duplicateCodes, samples: duplicateSamples },
      "Collapsed duplicate stop codes (last occurrence kept)"
    );
  }

  const records = [...byCode.values()].sort((a, b) =>
    a.code < b.code ? -1 : a.code > b.code ? 1 : 0
  );

  log.debug(
    { label: options.label, records: records.length, ...issues },
    "Built snapshot"
  );

  return {
    snapshot: {
      label: options.label,
      capturedAt: (options.capturedAt ?? new Date()).toISOString(),
      records,
    },
    issues,
  };
}
