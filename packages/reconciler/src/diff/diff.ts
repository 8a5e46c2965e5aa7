/**
 * Snapshot diff.
 *
 * Partitions the union of both snapshots' codes into four disjoint groups:
 * new, removed, name-changed and unchanged. Names are compared exactly
 * after trimming.
 */

import type {
  ChangeEntry,
  ChangeReport,
  NameChange,
  Snapshot,
} from "@stop-sync/types";

function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function nameIndex(snapshot: Snapshot): Map<string, string> {
  return new Map(snapshot.records.map((r) => [r.code, r.name.trim()]));
}

/**
 * Diff the current snapshot against the previous one.
 *
 * A null previous snapshot is a first run: every current code is new.
 */
export function diffSnapshots(
  previous: Snapshot | null,
  current: Snapshot
): ChangeReport {
  const before = previous ? nameIndex(previous) : new Map<string, string>();
  const after = nameIndex(current);

  const newCodes: string[] = [];
  const unchangedCodes: string[] = [];
  const nameChanged: NameChange[] = [];

  for (const [code, newName] of after) {
    const oldName = before.get(code);
    if (oldName === undefined) {
      newCodes.push(code);
    } else if (oldName === newName) {
      unchangedCodes.push(code);
    } else {
      nameChanged.push({ code, oldName, newName });
    }
  }

  const removedCodes = [...before.keys()].filter((code) => !after.has(code));

  newCodes.sort(compareCodes);
  removedCodes.sort(compareCodes);
  unchangedCodes.sort(compareCodes);
  nameChanged.sort((a, b) => compareCodes(a.code, b.code));

  const entries: ChangeEntry[] = [
    ...newCodes.map(
      (code): ChangeEntry => ({
        code,
        changeType: "new",
        oldName: null,
        newName: after.get(code) ?? null,
      })
    ),
    ...nameChanged.map(
      (change): ChangeEntry => ({
        code: change.code,
        changeType: "name_changed",
        oldName: change.oldName,
        newName: change.newName,
      })
    ),
    ...removedCodes.map(
      (code): ChangeEntry => ({
        code,
        changeType: "removed",
        oldName: before.get(code) ?? null,
        newName: null,
      })
    ),
  ];

  const totalChanges =
    newCodes.length + removedCodes.length + nameChanged.length;

  return Object.freeze({
    previousLabel: previous?.label ?? null,
    currentLabel: current.label,
    newCodes: Object.freeze(newCodes),
    removedCodes: Object.freeze(removedCodes),
    unchangedCodes: Object.freeze(unchangedCodes),
    nameChanged: Object.freeze(nameChanged.map((c) => Object.freeze(c))),
    entries: Object.freeze(entries.map((e) => Object.freeze(e))),
    counts: Object.freeze({
      totalPrevious: before.size,
      totalCurrent: after.size,
      netDelta: after.size - before.size,
      newCount: newCodes.length,
      removedCount: removedCodes.length,
      nameChangedCount: nameChanged.length,
      unchangedCount: unchangedCodes.length,
      totalChanges,
    }),
  });
}

/** True when the report has nothing to enrich */
export function hasEnrichmentWork(report: ChangeReport): boolean {
  return report.newCodes.length + report.nameChanged.length > 0;
}
