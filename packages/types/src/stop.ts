/**
 * Bus stop catalog types.
 *
 * A snapshot is one full capture of the stop catalog. Records are keyed by
 * their normalized 5-digit code; everything downstream compares codes, never
 * raw source values.
 */

/** A single stop as published by the catalog source, after normalization */
export interface StopRecord {
  /** Zero-padded 5-digit stop code */
  code: string;
  name: string;
  street: string;
  lat: number;
  lon: number;
}

/** A full catalog capture at one point in time */
export interface Snapshot {
  /** Date label the snapshot is stored under (YYYYMMDD) */
  label: string;
  /** ISO timestamp of the capture */
  capturedAt: string;
  /** Ordered by code ascending, one record per code */
  records: readonly StopRecord[];
}

/**
 * A catalog row before validation.
 *
 * Rows come from JSON pages or CSV files, so every field is untrusted:
 * codes may be numbers, coordinates may be strings.
 */
export type RawStopRow = Readonly<Record<string, unknown>>;

/** Raw catalog as returned by a catalog source */
export interface RawCatalog {
  rows: readonly RawStopRow[];
  fetchedAt: Date;
}

/** Rows dropped or collapsed while building a snapshot */
export interface NormalizationIssues {
  /** Rows whose code could not be normalized */
  malformedCodes: number;
  /** Rows with a valid code but an invalid name or coordinate */
  invalidRows: number;
  /** Earlier occurrences of a code replaced by a later one */
  duplicateCodes: number;
}
