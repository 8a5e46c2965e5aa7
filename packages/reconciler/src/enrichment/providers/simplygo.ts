/**
 * SimplyGo bus stop lookup.
 *
 * Submits the public bus-stop search form for one code and reads the stop's
 * description and road name from the result table.
 */

import axios, { type AxiosRequestConfig } from "axios";
import { load } from "cheerio";
import { LookupFailure } from "../../errors.js";
import type {
  LookupOutcome,
  LookupRequestOptions,
  NameLookup,
} from "../provider.js";

export const SIMPLYGO_SEARCH_URL =
  "https://svc.simplygo.com.sg/eservice/eguide/bscode_idx.php";

const ROAD_LABEL = "Road Name";
const DESCRIPTION_LABEL = "Bus Stop Description";
const COLUMN_LABELS = [ROAD_LABEL, DESCRIPTION_LABEL];

// ---------------------------------------------------------------------------
// Page parsing
// ---------------------------------------------------------------------------

export interface StopPageData {
  road?: string;
  description?: string;
}

/** A value equal to a column label means the page layout was misread */
function cleanValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed || COLUMN_LABELS.includes(trimmed)) return undefined;
  return trimmed;
}

function mentionsLabel(text: string): boolean {
  return COLUMN_LABELS.some((label) => text.includes(label));
}

/**
 * Extract road name and description from a search result page.
 *
 * Looks for a header row naming the columns and reads the row after it by
 * column position; falls back to `label | value` rows.
 */
export function parseStopPage(html: string): StopPageData {
  const $ = load(html);

  // Innermost table that mentions a column label
  const table = $("table")
    .toArray()
    .find(
      (t) =>
        mentionsLabel($(t).text()) &&
        !$(t)
          .find("table")
          .toArray()
          .some((inner) => mentionsLabel($(inner).text()))
    );
  if (!table) return {};

  const rows = $(table)
    .find("tr")
    .toArray()
    .map((row) => ({
      cells: $(row).find("th, td").toArray().map((c) => $(c).text().trim()),
      data: $(row).find("td").toArray().map((c) => $(c).text().trim()),
    }));
  let road: string | undefined;
  let description: string | undefined;

  const headerIndex = rows.findIndex((row) => row.cells.some(mentionsLabel));
  const headerRow = headerIndex >= 0 ? rows[headerIndex] : undefined;
  const dataRow = headerIndex >= 0 ? rows[headerIndex + 1] : undefined;

  if (headerRow && dataRow) {
    headerRow.cells.forEach((header, i) => {
      if (header.includes(ROAD_LABEL)) road = cleanValue(dataRow.data[i]);
      else if (header.includes(DESCRIPTION_LABEL)) description = cleanValue(dataRow.data[i]);
    });
  }

  if (!road && !description) {
    for (const { cells } of rows) {
      const [label, value] = cells;
      if (label === undefined) continue;
      if (label.includes(ROAD_LABEL)) road ??= cleanValue(value);
      if (label.includes(DESCRIPTION_LABEL)) description ??= cleanValue(value);
    }
  }

  return {
    ...(road ? { road } : {}),
    ...(description ? { description } : {}),
  };
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

export type HttpPost = (
  url: string,
  body: string,
  config: AxiosRequestConfig<string>
) => Promise<{ status: number; data: unknown }>;

export interface SimplyGoLookupOptions {
  /** Search form URL. Default: the public SimplyGo e-guide */
  url?: string;
  /** Delay before each request (ms). Default: 0 */
  requestDelayMs?: number;
  /** Injectable POST for testability */
  post?: HttpPost;
}

export class SimplyGoLookup implements NameLookup {
  readonly name = "SimplyGo bus stop search";

  private readonly url: string;
  private readonly requestDelayMs: number;
  private readonly post: HttpPost;

  constructor(options: SimplyGoLookupOptions = {}) {
    this.url = options.url ?? SIMPLYGO_SEARCH_URL;
    this.requestDelayMs = options.requestDelayMs ?? 0;
    this.post = options.post ?? ((url, body, config) => axios.post(url, body, config));
  }

  async fetch(code: string, options: LookupRequestOptions = {}): Promise<LookupOutcome> {
    if (this.requestDelayMs > 0) {
      await delay(this.requestDelayMs, options.signal);
    }
    if (options.signal?.aborted) {
      throw new LookupFailure(code, "Lookup aborted before the request was sent");
    }

    const body = new URLSearchParams({ bscode: code, B1: "Search" }).toString();
    const res = await this.post(this.url, body, {
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      responseType: "text",
      validateStatus: () => true,
      signal: options.signal,
    });

    if (res.status < 200 || res.status >= 300) {
      throw new LookupFailure(code, `SimplyGo responded with status ${res.status}`);
    }
    if (typeof res.data !== "string") {
      throw new LookupFailure(code, "SimplyGo returned a non-HTML response");
    }

    const page = parseStopPage(res.data);
    if (!page.road && !page.description) {
      return { success: false, error: `No stop details found for ${code}` };
    }
    return {
      success: true,
      ...(page.description ? { correctedName: page.description } : {}),
      ...(page.road ? { street: page.road } : {}),
    };
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
