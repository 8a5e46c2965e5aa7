/**
 * @stop-sync/reconciler
 *
 * Reconciles dated snapshots of the bus stop catalog, looks up names only
 * for new and renamed stops, and writes the merged catalog with per-record
 * name provenance.
 */

export * from "./errors.js";
export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from "./logger.js";
export { loadConfig, loadEnvFile, type SyncConfig } from "./config.js";
export * from "./normalize/index.js";
export * from "./diff/index.js";
export * from "./enrichment/index.js";
export * from "./ingestion/index.js";
export * from "./storage/index.js";
export * from "./notify/index.js";
export {
  runSync,
  formatDateLabel,
  formatRunId,
  type SyncDependencies,
  type SyncOptions,
} from "./pipeline.js";
export { createSyncDependencies } from "./dependencies.js";
