/**
 * CSV formats for snapshots, change reports and final records.
 *
 * Column layouts are stable; downstream consumers read these files.
 */

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type {
  ChangeReport,
  FinalRecord,
  RawStopRow,
  StopRecord,
} from "@stop-sync/types";

export const SNAPSHOT_COLUMNS = ["code", "name", "street", "lat", "lon"] as const;

export const FINAL_COLUMNS = [
  ...SNAPSHOT_COLUMNS,
  "corrected_name",
  "name_source",
] as const;

export const CHANGE_COLUMNS = [
  "code",
  "change_type",
  "old_name",
  "new_name",
] as const;

const rowsSchema = z.array(z.record(z.string()));

function toCsv(header: readonly string[], rows: (string | number)[][]): string {
  return stringify([[...header], ...rows]);
}

export function encodeSnapshot(records: readonly StopRecord[]): string {
  return toCsv(
    SNAPSHOT_COLUMNS,
    records.map((r) => [r.code, r.name, r.street, r.lat, r.lon])
  );
}

export function encodeFinalRecords(records: readonly FinalRecord[]): string {
  return toCsv(
    FINAL_COLUMNS,
    records.map((r) => [
      r.code,
      r.name,
      r.street,
      r.lat,
      r.lon,
      r.correctedName,
      r.nameSource,
    ])
  );
}

export function encodeChangeReport(report: ChangeReport): string {
  return toCsv(
    CHANGE_COLUMNS,
    report.entries.map((e) => [
      e.code,
      e.changeType,
      e.oldName ?? "",
      e.newName ?? "",
    ])
  );
}

/**
 * Parse a CSV with a header row into raw rows keyed by column name.
 * Values stay strings; buildSnapshot validates them.
 */
export function decodeRows(text: string): RawStopRow[] {
  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
  });
  return rowsSchema.parse(records);
}
