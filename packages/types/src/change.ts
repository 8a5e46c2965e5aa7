/**
 * Change report types.
 *
 * A change report is the diff between two snapshots. It is produced once
 * per run and never mutated.
 */

/** Kind of change recorded for a code */
export type ChangeType = "new" | "removed" | "name_changed";

/** A code present in both snapshots whose name differs */
export interface NameChange {
  code: string;
  oldName: string;
  newName: string;
}

/** One serializable row of a change report */
export interface ChangeEntry {
  code: string;
  changeType: ChangeType;
  /** Name in the previous snapshot (null for new codes) */
  oldName: string | null;
  /** Name in the current snapshot (null for removed codes) */
  newName: string | null;
}

export interface ChangeCounts {
  totalPrevious: number;
  totalCurrent: number;
  /** totalCurrent - totalPrevious */
  netDelta: number;
  newCount: number;
  removedCount: number;
  nameChangedCount: number;
  unchangedCount: number;
  /** newCount + removedCount + nameChangedCount */
  totalChanges: number;
}

export interface ChangeReport {
  /** Label of the previous snapshot, null on a first run */
  previousLabel: string | null;
  currentLabel: string;
  newCodes: readonly string[];
  removedCodes: readonly string[];
  unchangedCodes: readonly string[];
  nameChanged: readonly NameChange[];
  /** Ordered new, name_changed, removed; each group by code */
  entries: readonly ChangeEntry[];
  counts: ChangeCounts;
}
