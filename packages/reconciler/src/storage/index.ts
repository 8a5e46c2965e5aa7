export { previousLabel, type ReportLabels, type SnapshotStore } from "./store.js";
export { FileSnapshotStore, type FileSnapshotStoreOptions } from "./file-store.js";
export { MemorySnapshotStore } from "./memory-store.js";
export { parseCheckpoint } from "./checkpoint.js";
export {
  CHANGE_COLUMNS,
  FINAL_COLUMNS,
  SNAPSHOT_COLUMNS,
  decodeRows,
  encodeChangeReport,
  encodeFinalRecords,
  encodeSnapshot,
} from "./csv.js";
