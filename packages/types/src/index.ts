/**
 * @stop-sync/types
 *
 * Shared domain types for the stop catalog reconciler.
 *
 * - Stop: catalog records and snapshots
 * - Change: the diff between two snapshots
 * - Enrichment: lookup work items, results and final records
 * - Run: the summary returned to callers
 */

export * from "./stop.js";
export * from "./change.js";
export * from "./enrichment.js";
export * from "./run.js";
