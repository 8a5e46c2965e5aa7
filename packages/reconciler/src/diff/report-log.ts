import type { ChangeReport } from "@stop-sync/types";
import type { Logger } from "../logger.js";
import { hasEnrichmentWork } from "./diff.js";

const SAMPLE_SIZE = 3;

/**
 * Log the comparison between two snapshots: totals, per-category counts,
 * a few sample codes per category and whether enrichment will run.
 */
export function logChangeReport(report: ChangeReport, logger: Logger): void {
  const log = logger.child({ component: "diff" });
  const { counts } = report;

  log.info(
    {
      previous: report.previousLabel,
      current: report.currentLabel,
      totalPrevious: counts.totalPrevious,
      totalCurrent: counts.totalCurrent,
      netDelta: counts.netDelta,
    },
    report.previousLabel === null
      ? "No previous snapshot; treating every stop as new"
      : `Compared ${report.previousLabel} with ${report.currentLabel}`
  );

  log.info(
    {
      new: counts.newCount,
      removed: counts.removedCount,
      nameChanged: counts.nameChangedCount,
      unchanged: counts.unchangedCount,
      totalChanges: counts.totalChanges,
    },
    "Change breakdown"
  );

  if (report.newCodes.length > 0) {
    log.info(
      { samples: report.newCodes.slice(0, SAMPLE_SIZE) },
      `${report.newCodes.length} new stops`
    );
  }
  if (report.removedCodes.length > 0) {
    log.info(
      { samples: report.removedCodes.slice(0, SAMPLE_SIZE) },
      `${report.removedCodes.length} removed stops`
    );
  }
  if (report.nameChanged.length > 0) {
    log.info(
      {
        samples: report.nameChanged
          .slice(0, SAMPLE_SIZE)
          .map((c) => `${c.code}: ${c.oldName} → ${c.newName}`),
      },
      `${report.nameChanged.length} renamed stops`
    );
  }

  if (hasEnrichmentWork(report)) {
    const targets = report.newCodes.length + report.nameChanged.length;
    log.info({ targets }, "Enrichment will run for new and renamed stops");
  } else {
    log.info("No new or renamed stops; enrichment skipped");
  }
}
