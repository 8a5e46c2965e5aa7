export { CODE_WIDTH, normalizeCode, tryNormalizeCode } from "./code.js";
export { stopRowSchema, type StopRowFields } from "./schema.js";
export {
  buildSnapshot,
  type BuildSnapshotOptions,
  type BuildSnapshotResult,
} from "./snapshot.js";
