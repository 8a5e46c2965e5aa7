/**
 * Merge and provenance.
 *
 * Final records are built here and nowhere else. Each keeps the current
 * catalog's street and coordinates; only the name may come from a lookup.
 */

import type {
  EnrichmentResult,
  FinalRecord,
  Snapshot,
} from "@stop-sync/types";

/** Values that mean "no name" when they show up in a lookup result */
const PLACEHOLDER_NAMES = new Set([
  "nan",
  "none",
  "null",
  "n/a",
  "road name",
  "bus stop description",
]);

/** A trimmed, non-placeholder name, or null */
export function usableName(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  if (!trimmed || PLACEHOLDER_NAMES.has(trimmed.toLowerCase())) return null;
  return trimmed;
}

/**
 * Fold enrichment results into the current snapshot.
 *
 * Output order follows `current`. When several results share a code the
 * last one wins; results for codes not in `current` are ignored.
 */
export function mergeRecords(
  current: Snapshot,
  results: readonly EnrichmentResult[]
): FinalRecord[] {
  const byCode = new Map<string, EnrichmentResult>();
  for (const result of results) byCode.set(result.code, result);

  return current.records.map((record): FinalRecord => {
    const result = byCode.get(record.code);
    const enriched = result?.success ? usableName(result.correctedName) : null;
    return enriched !== null
      ? { ...record, correctedName: enriched, nameSource: "Enriched" }
      : { ...record, correctedName: record.name, nameSource: "Original" };
  });
}

/** Number of records whose name came from a lookup */
export function countCorrections(records: readonly FinalRecord[]): number {
  return records.filter((r) => r.nameSource === "Enriched").length;
}
