import { describe, it, expect, vi } from "vitest";
import type { RawStopRow, Snapshot } from "@stop-sync/types";
import type { LookupOutcome, NameLookup } from "./enrichment/provider.js";
import { SourceUnavailableError } from "./errors.js";
import type { CatalogSource } from "./ingestion/source.js";
import { formatDateLabel, formatRunId, runSync } from "./pipeline.js";
import { MemorySnapshotStore } from "./storage/memory-store.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const RUN_DATE = new Date("2024-03-01T08:30:00.000Z");

function makeRows(names: Record<string, string>): RawStopRow[] {
  return Object.entries(names).map(([code, name]) => ({
    code,
    name,
    street: "Main Rd",
    lat: "1.3",
    lon: "103.8",
  }));
}

function makeSnapshot(label: string, names: Record<string, string>): Snapshot {
  return {
    label,
    capturedAt: "2024-02-01T00:00:00.000Z",
    records: Object.entries(names).map(([code, name]) => ({
      code,
      name,
      street: "Main Rd",
      lat: 1.3,
      lon: 103.8,
    })),
  };
}

function makeCatalog(rows: RawStopRow[]): CatalogSource {
  return {
    name: "Fake Catalog",
    fetchCurrent: async () => ({ rows, fetchedAt: RUN_DATE }),
  };
}

function makeLookup(fn: (code: string) => LookupOutcome) {
  const fetch = vi.fn(async (code: string) => fn(code));
  const lookup: NameLookup = { name: "Fake Lookup", fetch };
  return { lookup, fetch };
}

const options = { concurrency: 2, batchSize: 5, runDate: RUN_DATE };

// ─── Labels ─────────────────────────────────────────────────────────────────

describe("run labels", () => {
  it("formats dates and run ids in UTC", () => {
    const date = new Date("2024-01-05T03:04:05.000Z");
    expect(formatDateLabel(date)).toBe("20240105");
    expect(formatRunId(date)).toBe("20240105_030405");
  });
});

// ─── runSync ────────────────────────────────────────────────────────────────

describe("runSync", () => {
  it("skips enrichment when nothing changed", async () => {
    const store = new MemorySnapshotStore([makeSnapshot("20240201", { "00001": "A" })]);
    const { lookup, fetch } = makeLookup(() => ({ success: true, correctedName: "X" }));

    const summary = await runSync(
      { catalog: makeCatalog(makeRows({ "1": "A" })), store, lookup },
      options
    );

    expect(fetch).not.toHaveBeenCalled();
    expect(summary).toMatchObject({
      runId: "20240301_083000",
      previousLabel: "20240201",
      currentLabel: "20240301",
      totalCurrent: 1,
      totalPrevious: 1,
      newCount: 0,
      removedCount: 0,
      nameChangedCount: 0,
      enrichedCount: 0,
      correctionsApplied: 0,
      cancelled: false,
    });
    expect(store.finals.get("20240301_083000")).toEqual([
      {
        code: "00001",
        name: "A",
        street: "Main Rd",
        lat: 1.3,
        lon: 103.8,
        correctedName: "A",
        nameSource: "Original",
      },
    ]);
  });

  it("enriches a new stop", async () => {
    const store = new MemorySnapshotStore([makeSnapshot("20240201", { "00001": "A" })]);
    const { lookup, fetch } = makeLookup(() => ({
      success: true,
      correctedName: "B-corrected",
    }));

    const summary = await runSync(
      { catalog: makeCatalog(makeRows({ "1": "A", "2": "B" })), store, lookup },
      options
    );

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0]?.[0]).toBe("00002");
    expect(summary.newCount).toBe(1);
    expect(summary.enrichmentSuccessCount).toBe(1);
    expect(summary.correctionsApplied).toBe(1);

    const finals = store.finals.get(summary.runId) ?? [];
    expect(finals.map((r) => [r.code, r.correctedName, r.nameSource])).toEqual([
      ["00001", "A", "Original"],
      ["00002", "B-corrected", "Enriched"],
    ]);
  });

  it("keeps the catalog name when a renamed stop's lookup fails", async () => {
    const store = new MemorySnapshotStore([makeSnapshot("20240201", { "00001": "A" })]);
    const { lookup } = makeLookup(() => ({ success: false, error: "not found" }));

    const summary = await runSync(
      { catalog: makeCatalog(makeRows({ "1": "A2" })), store, lookup },
      options
    );

    expect(summary.nameChangedCount).toBe(1);
    expect(summary.enrichmentFailureCount).toBe(1);
    expect(store.finals.get(summary.runId)?.[0]).toMatchObject({
      code: "00001",
      correctedName: "A2",
      nameSource: "Original",
    });
    expect(store.changeReports.get("20240201-20240301")?.nameChanged).toEqual([
      { code: "00001", oldName: "A", newName: "A2" },
    ]);
  });

  it("treats every stop as new on a first run", async () => {
    const store = new MemorySnapshotStore();
    const { lookup, fetch } = makeLookup((code) => ({
      success: true,
      correctedName: `Stop ${code}`,
    }));

    const summary = await runSync(
      { catalog: makeCatalog(makeRows({ "1": "A", "2": "B" })), store, lookup },
      options
    );

    expect(summary.previousLabel).toBeNull();
    expect(summary.newCount).toBe(2);
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(store.snapshots.has("20240301")).toBe(true);
    expect(store.changeReports.has("20240301")).toBe(true);
  });

  it("respects the lookup limit", async () => {
    const store = new MemorySnapshotStore();
    const { lookup, fetch } = makeLookup((code) => ({
      success: true,
      correctedName: `Stop ${code}`,
    }));

    const summary = await runSync(
      { catalog: makeCatalog(makeRows({ "3": "C", "1": "A", "2": "B" })), store, lookup },
      { ...options, limit: 1 }
    );

    expect(fetch.mock.calls.map(([code]) => code)).toEqual(["00001"]);
    expect(summary.enrichedCount).toBe(1);
    expect(summary.correctionsApplied).toBe(1);
  });

  it("writes checkpoints through the store", async () => {
    const store = new MemorySnapshotStore();
    const { lookup } = makeLookup((code) => ({ success: true, correctedName: `Stop ${code}` }));

    await runSync(
      { catalog: makeCatalog(makeRows({ "1": "A", "2": "B" })), store, lookup },
      { ...options, concurrency: 1, batchSize: 1 }
    );

    expect(store.checkpoints.map((c) => c.completed)).toEqual([
      ["00001"],
      ["00001", "00002"],
    ]);
    expect(store.checkpoints.every((c) => c.runId === "20240301_083000")).toBe(true);
  });

  it("continues from a checkpoint without repeating finished lookups", async () => {
    const store = new MemorySnapshotStore([
      makeSnapshot("20240201", { "00001": "A" }),
      makeSnapshot("20240301", { "00001": "A", "00002": "B", "00003": "C" }),
    ]);
    await store.persistCheckpoint({
      runId: "20240301_070000",
      savedAt: "2024-03-01T07:05:00.000Z",
      previousLabel: "20240201",
      currentLabel: "20240301",
      total: 2,
      completed: ["00002"],
      remaining: ["00003"],
      results: [{ code: "00002", success: true, correctedName: "B-resumed", attempts: 1 }],
    });
    const { lookup, fetch } = makeLookup(() => ({ success: true, correctedName: "C-new" }));

    const summary = await runSync(
      { catalog: makeCatalog(makeRows({ "1": "A", "2": "B", "3": "C" })), store, lookup },
      { ...options, resumeFrom: "20240301_070000" }
    );

    expect(fetch.mock.calls.map(([code]) => code)).toEqual(["00003"]);
    expect(summary.runId).toBe("20240301_070000");
    expect(summary.enrichedCount).toBe(2);
    expect(
      store.finals.get("20240301_070000")?.map((r) => r.correctedName)
    ).toEqual(["A", "B-resumed", "C-new"]);
  });

  it("resumes on a later day against the interrupted run's snapshots", async () => {
    const store = new MemorySnapshotStore([
      makeSnapshot("20240301", { "00001": "A" }),
      makeSnapshot("20240302", { "00001": "A", "00002": "B", "00003": "C" }),
    ]);
    await store.persistCheckpoint({
      runId: "20240302_233000",
      savedAt: "2024-03-02T23:45:00.000Z",
      previousLabel: "20240301",
      currentLabel: "20240302",
      total: 2,
      completed: ["00002"],
      remaining: ["00003"],
      results: [{ code: "00002", success: true, correctedName: "B-fixed", attempts: 1 }],
    });
    const fetchCurrent = vi.fn(async () => ({
      rows: makeRows({ "1": "A", "2": "B", "3": "C", "4": "D" }),
      fetchedAt: RUN_DATE,
    }));
    const { lookup, fetch } = makeLookup(() => ({ success: true, correctedName: "C-new" }));

    const summary = await runSync(
      { catalog: { name: "Fake Catalog", fetchCurrent }, store, lookup },
      {
        ...options,
        runDate: new Date("2024-03-03T00:15:00.000Z"),
        resumeFrom: "20240302_233000",
      }
    );

    expect(fetchCurrent).not.toHaveBeenCalled();
    expect(fetch.mock.calls.map(([code]) => code)).toEqual(["00003"]);
    expect(summary).toMatchObject({
      runId: "20240302_233000",
      previousLabel: "20240301",
      currentLabel: "20240302",
      newCount: 2,
      enrichedCount: 2,
      enrichmentSuccessCount: 2,
    });
    expect(
      store.finals
        .get("20240302_233000")
        ?.map((r) => `${r.code}:${r.correctedName}:${r.nameSource}`)
    ).toEqual(["00001:A:Original", "00002:B-fixed:Enriched", "00003:C-new:Enriched"]);
    expect([...store.snapshots.keys()]).toEqual(["20240301", "20240302"]);
    expect(store.checkpoints.at(-1)).toMatchObject({
      runId: "20240302_233000",
      previousLabel: "20240301",
      currentLabel: "20240302",
      completed: ["00002", "00003"],
      remaining: [],
    });
  });

  it("refuses to resume from a checkpoint that names no snapshots", async () => {
    const store = new MemorySnapshotStore([makeSnapshot("20240201", { "00001": "A" })]);
    await store.persistCheckpoint({
      runId: "adhoc",
      savedAt: "2024-03-01T07:05:00.000Z",
      total: 1,
      completed: [],
      remaining: ["00001"],
      results: [],
    });
    const { lookup, fetch } = makeLookup(() => ({ success: false }));

    await expect(
      runSync(
        { catalog: makeCatalog(makeRows({ "1": "A" })), store, lookup },
        { ...options, resumeFrom: "adhoc" }
      )
    ).rejects.toThrow(
      new SourceUnavailableError(
        "Checkpoint for run adhoc does not name the snapshots it compared"
      )
    );
    expect(fetch).not.toHaveBeenCalled();
    expect(store.finals.size).toBe(0);
  });

  it.each([
    [{ limit: -1 }],
    [{ limit: 1.5 }],
    [{ concurrency: 0 }],
    [{ batchSize: 0 }],
    [{ maxAttempts: 0 }],
    [{ timeoutMs: 0 }],
    [{ checkpointIntervalMs: 0 }],
  ])("rejects %j before writing anything", async (invalid) => {
    const store = new MemorySnapshotStore();
    const { lookup, fetch } = makeLookup(() => ({ success: false }));

    await expect(
      runSync(
        { catalog: makeCatalog(makeRows({ "1": "A" })), store, lookup },
        { ...options, ...invalid }
      )
    ).rejects.toThrow(RangeError);
    expect(fetch).not.toHaveBeenCalled();
    expect(store.snapshots.size).toBe(0);
    expect(store.changeReports.size).toBe(0);
    expect(store.finals.size).toBe(0);
  });

  it("rejects an invalid concurrency even when nothing needs a lookup", async () => {
    const store = new MemorySnapshotStore([makeSnapshot("20240201", { "00001": "A" })]);
    const { lookup } = makeLookup(() => ({ success: false }));

    await expect(
      runSync(
        { catalog: makeCatalog(makeRows({ "1": "A" })), store, lookup },
        { ...options, concurrency: 0 }
      )
    ).rejects.toThrow("concurrency must be a positive integer, got 0");
    expect(store.snapshots.has("20240301")).toBe(false);
  });

  it("still merges and persists when cancelled", async () => {
    const store = new MemorySnapshotStore();
    const controller = new AbortController();
    controller.abort();
    const { lookup, fetch } = makeLookup(() => ({ success: true, correctedName: "X" }));

    const summary = await runSync(
      { catalog: makeCatalog(makeRows({ "1": "A" })), store, lookup },
      { ...options, signal: controller.signal }
    );

    expect(fetch).not.toHaveBeenCalled();
    expect(summary.cancelled).toBe(true);
    expect(store.finals.get(summary.runId)?.[0]?.nameSource).toBe("Original");
  });

  it("fails without persisting anything when the catalog has no valid rows", async () => {
    const store = new MemorySnapshotStore();
    const { lookup } = makeLookup(() => ({ success: false }));

    await expect(
      runSync(
        { catalog: makeCatalog(makeRows({ nan: "A", "": "B" })), store, lookup },
        options
      )
    ).rejects.toThrow(
      new SourceUnavailableError("Fake Catalog returned no valid records (2 rows)")
    );
    expect(store.snapshots.size).toBe(0);
    expect(store.finals.size).toBe(0);
  });

  it("wraps an unexpected catalog error", async () => {
    const catalog: CatalogSource = {
      name: "Broken Catalog",
      fetchCurrent: async () => {
        throw new TypeError("boom");
      },
    };
    const { lookup } = makeLookup(() => ({ success: false }));

    await expect(
      runSync({ catalog, store: new MemorySnapshotStore(), lookup }, options)
    ).rejects.toThrow(new SourceUnavailableError("Broken Catalog failed: boom"));
  });

  it("fails fast on an empty previous snapshot", async () => {
    const store = new MemorySnapshotStore([makeSnapshot("20240201", {})]);
    const { lookup } = makeLookup(() => ({ success: false }));

    await expect(
      runSync({ catalog: makeCatalog(makeRows({ "1": "A" })), store, lookup }, options)
    ).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(store.snapshots.has("20240301")).toBe(false);
  });

  it("reports the duration from the injected clock", async () => {
    const times = [
      new Date("2024-03-01T08:30:00.000Z"),
      new Date("2024-03-01T08:30:02.500Z"),
    ];
    const { lookup } = makeLookup(() => ({ success: false }));

    const summary = await runSync(
      {
        catalog: makeCatalog(makeRows({ "1": "A" })),
        store: new MemorySnapshotStore([makeSnapshot("20240201", { "00001": "A" })]),
        lookup,
        now: () => times.shift() ?? new Date("2024-03-01T08:30:02.500Z"),
      },
      { concurrency: 1, batchSize: 1 }
    );

    expect(summary.runId).toBe("20240301_083000");
    expect(summary.durationMs).toBe(2500);
  });
});
