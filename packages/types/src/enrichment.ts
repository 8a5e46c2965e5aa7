/**
 * Name enrichment types.
 *
 * Only codes that are new or renamed get an external lookup. Each lookup
 * produces exactly one result, and the merge step decides per record
 * whether the looked-up name or the catalog name wins.
 */

import type { StopRecord } from "./stop.js";

/** Why a code was selected for lookup */
export type EnrichmentReason = "new" | "name_changed";

export interface WorkItem {
  code: string;
  reason: EnrichmentReason;
}

/** Outcome of one lookup attempt sequence for a code */
export interface EnrichmentResult {
  code: string;
  success: boolean;
  /** Name reported by the lookup source */
  correctedName?: string;
  /** Street reported by the lookup source (informational only) */
  street?: string;
  /** Message of the failure cause when success is false */
  error?: string;
  /** Number of lookup attempts made */
  attempts: number;
}

/** Where a final record's name came from */
export type NameSource = "Original" | "Enriched";

export interface FinalRecord extends StopRecord {
  correctedName: string;
  nameSource: NameSource;
}

/** Labels of the two snapshots a work list was derived from */
export interface ComparedSnapshots {
  /** Null on a first run */
  previousLabel: string | null;
  currentLabel: string;
}

/** Persisted scheduler progress, enough to resume an interrupted run */
export interface CheckpointState {
  runId: string;
  /** ISO timestamp of the write */
  savedAt: string;
  /** Present when the work list came from a snapshot comparison */
  previousLabel?: string | null;
  currentLabel?: string;
  /** Number of work items in the run */
  total: number;
  completed: string[];
  remaining: string[];
  results: EnrichmentResult[];
}
