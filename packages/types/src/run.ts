/** Summary of one reconciliation run, used for reporting and notifications */
export interface RunSummary {
  runId: string;
  previousLabel: string | null;
  currentLabel: string;
  totalCurrent: number;
  totalPrevious: number;
  newCount: number;
  removedCount: number;
  nameChangedCount: number;
  /** Lookups completed (including results resumed from a checkpoint) */
  enrichedCount: number;
  enrichmentSuccessCount: number;
  enrichmentFailureCount: number;
  /** Final records whose name came from the lookup source */
  correctionsApplied: number;
  /** True when a shutdown signal stopped dispatch early */
  cancelled: boolean;
  checkpointFailures: number;
  durationMs: number;
}
