import { describe, it, expect } from "vitest";
import type { Snapshot, StopRecord } from "@stop-sync/types";
import { diffSnapshots, hasEnrichmentWork } from "./diff.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeRecord(code: string, name: string): StopRecord {
  return { code, name, street: "Some Rd", lat: 1.3, lon: 103.8 };
}

function makeSnapshot(label: string, names: Record<string, string>): Snapshot {
  const records = Object.entries(names)
    .map(([code, name]) => makeRecord(code, name))
    .sort((a, b) => a.code.localeCompare(b.code));
  return { label, capturedAt: "2024-03-01T00:00:00.000Z", records };
}

// ─── diffSnapshots ──────────────────────────────────────────────────────────

describe("diffSnapshots", () => {
  it("partitions codes into new, removed, renamed and unchanged", () => {
    const previous = makeSnapshot("20240201", {
      "00001": "A",
      "00002": "B",
      "00003": "C",
    });
    const current = makeSnapshot("20240301", {
      "00001": "A",
      "00002": "B2",
      "00004": "D",
    });

    const report = diffSnapshots(previous, current);

    expect(report.previousLabel).toBe("20240201");
    expect(report.currentLabel).toBe("20240301");
    expect(report.newCodes).toEqual(["00004"]);
    expect(report.removedCodes).toEqual(["00003"]);
    expect(report.unchangedCodes).toEqual(["00001"]);
    expect(report.nameChanged).toEqual([
      { code: "00002", oldName: "B", newName: "B2" },
    ]);
    expect(report.counts).toEqual({
      totalPrevious: 3,
      totalCurrent: 3,
      netDelta: 0,
      newCount: 1,
      removedCount: 1,
      nameChangedCount: 1,
      unchangedCount: 1,
      totalChanges: 3,
    });
  });

  it("orders entries by change type then code", () => {
    const previous = makeSnapshot("p", {
      "00005": "E",
      "00009": "I",
      "00003": "C",
      "00007": "G",
    });
    const current = makeSnapshot("c", {
      "00008": "H",
      "00002": "B",
      "00007": "G2",
      "00003": "C2",
    });

    const report = diffSnapshots(previous, current);

    expect(report.entries).toEqual([
      { code: "00002", changeType: "new", oldName: null, newName: "B" },
      { code: "00008", changeType: "new", oldName: null, newName: "H" },
      { code: "00003", changeType: "name_changed", oldName: "C", newName: "C2" },
      { code: "00007", changeType: "name_changed", oldName: "G", newName: "G2" },
      { code: "00005", changeType: "removed", oldName: "E", newName: null },
      { code: "00009", changeType: "removed", oldName: "I", newName: null },
    ]);
  });

  it("treats a missing previous snapshot as a first run", () => {
    const current = makeSnapshot("c", { "00002": "B", "00001": "A" });
    const report = diffSnapshots(null, current);

    expect(report.previousLabel).toBeNull();
    expect(report.newCodes).toEqual(["00001", "00002"]);
    expect(report.removedCodes).toEqual([]);
    expect(report.counts.totalPrevious).toBe(0);
    expect(report.counts.netDelta).toBe(2);
  });

  it("compares names exactly after trimming", () => {
    const previous = makeSnapshot("p", { "00001": "Opp Blk 1 ", "00002": "Blk 2" });
    const current = makeSnapshot("c", { "00001": " Opp Blk 1", "00002": "BLK 2" });

    const report = diffSnapshots(previous, current);

    expect(report.unchangedCodes).toEqual(["00001"]);
    expect(report.nameChanged).toEqual([
      { code: "00002", oldName: "Blk 2", newName: "BLK 2" },
    ]);
  });

  it("yields no changes when diffing a snapshot against itself", () => {
    const snapshot = makeSnapshot("s", { "00001": "A", "00002": "B", "00003": "C" });
    const report = diffSnapshots(snapshot, snapshot);

    expect(report.counts.totalChanges).toBe(0);
    expect(report.entries).toEqual([]);
    expect(report.unchangedCodes).toEqual(["00001", "00002", "00003"]);
  });

  it("keeps the groups disjoint and covering both snapshots", () => {
    const prevNames: Record<string, string> = {};
    const currNames: Record<string, string> = {};
    for (let i = 0; i < 60; i++) {
      const code = String(i).padStart(5, "0");
      if (i % 3 !== 0) prevNames[code] = `Stop ${i}`;
      if (i % 4 !== 0) currNames[code] = i % 5 === 0 ? `Stop ${i} (new)` : `Stop ${i}`;
    }

    const report = diffSnapshots(
      makeSnapshot("p", prevNames),
      makeSnapshot("c", currNames)
    );

    const groups = [
      report.newCodes,
      report.removedCodes,
      report.unchangedCodes,
      report.nameChanged.map((c) => c.code),
    ];
    const all = groups.flat();
    expect(new Set(all).size).toBe(all.length);

    const union = new Set([...Object.keys(prevNames), ...Object.keys(currNames)]);
    expect(new Set(all)).toEqual(union);

    for (const code of report.newCodes) {
      expect(code in currNames && !(code in prevNames)).toBe(true);
    }
    for (const code of report.removedCodes) {
      expect(code in prevNames && !(code in currNames)).toBe(true);
    }
  });

  it("returns a frozen report", () => {
    const report = diffSnapshots(null, makeSnapshot("c", { "00001": "A" }));
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.newCodes)).toBe(true);
    expect(Object.isFrozen(report.entries[0])).toBe(true);
  });
});

describe("hasEnrichmentWork", () => {
  it("ignores removals", () => {
    const previous = makeSnapshot("p", { "00001": "A", "00002": "B" });
    const current = makeSnapshot("c", { "00001": "A" });
    expect(hasEnrichmentWork(diffSnapshots(previous, current))).toBe(false);
  });

  it("is true for new or renamed stops", () => {
    const previous = makeSnapshot("p", { "00001": "A" });
    expect(
      hasEnrichmentWork(diffSnapshots(previous, makeSnapshot("c", { "00001": "A2" })))
    ).toBe(true);
    expect(
      hasEnrichmentWork(
        diffSnapshots(previous, makeSnapshot("c", { "00001": "A", "00002": "B" }))
      )
    ).toBe(true);
  });
});
