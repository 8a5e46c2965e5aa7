import { describe, it, expect } from "vitest";
import { pino } from "pino";
import type { Snapshot } from "@stop-sync/types";
import { diffSnapshots } from "./diff.js";
import { logChangeReport } from "./report-log.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

interface LogLine {
  msg: string;
  component?: string;
  samples?: string[];
  targets?: number;
}

function captureLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "info" },
    { write: (chunk: string) => void lines.push(JSON.parse(chunk)) }
  );
  return { logger, lines };
}

function makeSnapshot(label: string, names: Record<string, string>): Snapshot {
  return {
    label,
    capturedAt: "2024-03-01T00:00:00.000Z",
    records: Object.entries(names).map(([code, name]) => ({
      code,
      name,
      street: "",
      lat: 0,
      lon: 0,
    })),
  };
}

// ─── logChangeReport ────────────────────────────────────────────────────────

describe("logChangeReport", () => {
  it("logs at most three samples per category", () => {
    const { logger, lines } = captureLogger();
    const report = diffSnapshots(
      makeSnapshot("20240201", { "00001": "A" }),
      makeSnapshot("20240301", {
        "00001": "A2",
        "00002": "B",
        "00003": "C",
        "00004": "D",
        "00005": "E",
      })
    );

    logChangeReport(report, logger);

    expect(lines.every((l) => l.component === "diff")).toBe(true);
    expect(lines[0]?.msg).toBe("Compared 20240201 with 20240301");

    const newLine = lines.find((l) => l.msg === "4 new stops");
    expect(newLine?.samples).toEqual(["00002", "00003", "00004"]);

    const renamed = lines.find((l) => l.msg === "1 renamed stops");
    expect(renamed?.samples).toEqual(["00001: A → A2"]);

    const last = lines[lines.length - 1];
    expect(last?.msg).toBe("Enrichment will run for new and renamed stops");
    expect(last?.targets).toBe(5);
  });

  it("reports a skipped enrichment when nothing changed", () => {
    const { logger, lines } = captureLogger();
    const snapshot = makeSnapshot("20240301", { "00001": "A" });

    logChangeReport(diffSnapshots(snapshot, snapshot), logger);

    expect(lines.map((l) => l.msg)).toEqual([
      "Compared 20240301 with 20240301",
      "Change breakdown",
      "No new or renamed stops; enrichment skipped",
    ]);
  });

  it("mentions a first run", () => {
    const { logger, lines } = captureLogger();
    logChangeReport(diffSnapshots(null, makeSnapshot("20240301", {})), logger);
    expect(lines[0]?.msg).toBe("No previous snapshot; treating every stop as new");
  });
});
