import type { ChangeReport, WorkItem } from "@stop-sync/types";

export interface SelectTargetsOptions {
  /** Keep only the first `limit` items */
  limit?: number;
  /** Codes already resolved; applied before the limit */
  exclude?: ReadonlySet<string>;
}

/** @throws RangeError if limit is negative or not an integer */
export function validateLimit(limit: number | undefined): void {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }
}

/**
 * Derive the enrichment work list from a change report.
 *
 * New codes come first, then renamed codes, each in code order. Removed
 * and unchanged codes are never selected.
 *
 * @throws RangeError if limit is negative or not an integer
 */
export function selectTargets(
  report: ChangeReport,
  options: SelectTargetsOptions = {}
): WorkItem[] {
  const { limit, exclude } = options;
  validateLimit(limit);

  const items: WorkItem[] = [
    ...[...report.newCodes].sort().map(
      (code): WorkItem => ({ code, reason: "new" })
    ),
    ...report.nameChanged
      .map((change) => change.code)
      .sort()
      .map((code): WorkItem => ({ code, reason: "name_changed" })),
  ].filter((item) => !exclude?.has(item.code));

  return limit === undefined ? items : items.slice(0, limit);
}
