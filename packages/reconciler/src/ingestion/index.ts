/**
 * Catalog ingestion.
 *
 * A catalog source returns the full current catalog as raw rows keyed
 * `code`, `name`, `street`, `lat`, `lon`. Validation happens later, in
 * buildSnapshot.
 */

export type { CatalogSource } from "./source.js";
export {
  DataMallCatalogSource,
  DATAMALL_BASE_URL,
  type DataMallOptions,
  type HttpGet,
} from "./datamall/client.js";
