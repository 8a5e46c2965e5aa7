export { diffSnapshots, hasEnrichmentWork } from "./diff.js";
export { logChangeReport } from "./report-log.js";
