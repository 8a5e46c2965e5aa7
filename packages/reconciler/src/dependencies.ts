import { ConfigError } from "./errors.js";
import { SimplyGoLookup } from "./enrichment/providers/simplygo.js";
import { DataMallCatalogSource } from "./ingestion/datamall/client.js";
import type { Logger } from "./logger.js";
import type { SyncConfig } from "./config.js";
import type { SyncDependencies } from "./pipeline.js";
import { FileSnapshotStore } from "./storage/file-store.js";

/**
 * Wire the production collaborators from configuration.
 *
 * @throws ConfigError when no DataMall API key is configured
 */
export function createSyncDependencies(
  config: SyncConfig,
  logger: Logger
): SyncDependencies {
  const apiKey = config.datamall.apiKey;
  if (!apiKey) {
    throw new ConfigError([
      "DATAMALL_API_KEY: required (set it in the environment or pass --api-key)",
    ]);
  }

  return {
    catalog: new DataMallCatalogSource({
      apiKey,
      baseUrl: config.datamall.baseUrl,
      logger,
    }),
    store: new FileSnapshotStore({
      dataDir: config.storage.dataDir,
      outputDir: config.storage.outputDir,
      logger,
    }),
    lookup: new SimplyGoLookup({
      url: config.simplygo.url,
      requestDelayMs: config.simplygo.requestDelayMs,
    }),
    logger,
  };
}
