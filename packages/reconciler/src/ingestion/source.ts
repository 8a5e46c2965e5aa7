import type { RawCatalog } from "@stop-sync/types";

/**
 * Supplies the full current catalog as raw rows keyed `code`, `name`,
 * `street`, `lat`, `lon`.
 */
export interface CatalogSource {
  /** Human-readable name */
  readonly name: string;
  /**
   * Fetch the complete current catalog.
   * @throws SourceUnavailableError when the catalog cannot be fetched
   */
  fetchCurrent(): Promise<RawCatalog>;
}
