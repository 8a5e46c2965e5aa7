export type {
  LookupOutcome,
  LookupRequestOptions,
  NameLookup,
} from "./provider.js";
export {
  selectTargets,
  validateLimit,
  type SelectTargetsOptions,
} from "./selector.js";
export {
  ResultAggregator,
  type CheckpointSink,
  type ResultAggregatorOptions,
} from "./aggregator.js";
export {
  runEnrichment,
  validateEnrichmentLimits,
  type EnrichmentLimits,
  type EnrichmentOptions,
  type EnrichmentRun,
} from "./scheduler.js";
export { mergeRecords, countCorrections, usableName } from "./merge.js";
export {
  SimplyGoLookup,
  parseStopPage,
  SIMPLYGO_SEARCH_URL,
  type HttpPost,
  type SimplyGoLookupOptions,
  type StopPageData,
} from "./providers/simplygo.js";
