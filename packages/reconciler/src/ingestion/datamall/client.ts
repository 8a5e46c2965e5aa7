/**
 * LTA DataMall bus stop catalog client.
 *
 * The BusStops endpoint pages through the catalog 500 records at a time via
 * `$skip`; an empty page marks the end.
 */

import axios, { type AxiosRequestConfig } from "axios";
import { z } from "zod";
import type { RawCatalog, RawStopRow } from "@stop-sync/types";
import { SourceUnavailableError, errorMessage } from "../../errors.js";
import { silentLogger, type Logger } from "../../logger.js";
import type { CatalogSource } from "../source.js";

export const DATAMALL_BASE_URL =
  "https://datamall2.mytransport.sg/ltaodataservice";

const PAGE_SIZE = 500;
const DEFAULT_RETRY_DELAYS = [5000, 10000, 15000];

// ---------------------------------------------------------------------------
// Response shape
// ---------------------------------------------------------------------------

/** Field values are checked by buildSnapshot; only the envelope is checked here */
const busStopSchema = z.object({
  BusStopCode: z.unknown(),
  Description: z.unknown(),
  RoadName: z.unknown(),
  Latitude: z.unknown(),
  Longitude: z.unknown(),
});

const pageSchema = z.object({
  value: z.array(busStopSchema),
});

type BusStop = z.infer<typeof busStopSchema>;

function toRawRow(stop: BusStop): RawStopRow {
  return {
    code: stop.BusStopCode,
    name: stop.Description,
    street: stop.RoadName,
    lat: stop.Latitude,
    lon: stop.Longitude,
  };
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export type HttpGet = (
  url: string,
  config: AxiosRequestConfig
) => Promise<{ status: number; statusText?: string; data: unknown }>;

export interface DataMallOptions {
  /** DataMall account key, sent as the AccountKey header */
  apiKey: string;
  /** Default: the public DataMall endpoint */
  baseUrl?: string;
  /** Delay between page requests (ms). Default: 1000 */
  pageDelayMs?: number;
  /** Backoff before each retry of a page (ms). Default: 5s, 10s, 15s */
  retryDelaysMs?: readonly number[];
  /** Injectable GET for testability */
  get?: HttpGet;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class DataMallCatalogSource implements CatalogSource {
  readonly name = "LTA DataMall BusStops";

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly pageDelayMs: number;
  private readonly retryDelaysMs: readonly number[];
  private readonly get: HttpGet;
  private readonly log: Logger;

  constructor(options: DataMallOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DATAMALL_BASE_URL).replace(/\/+$/, "");
    this.pageDelayMs = options.pageDelayMs ?? 1000;
    this.retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS;
    this.get = options.get ?? ((url, config) => axios.get(url, config));
    this.log = (options.logger ?? silentLogger).child({ component: "datamall" });
  }

  async fetchCurrent(): Promise<RawCatalog> {
    const rows: RawStopRow[] = [];
    let skip = 0;

    for (;;) {
      const page = await this.fetchPage(skip);
      if (page.length === 0) break;

      rows.push(...page.map(toRawRow));
      this.log.debug({ skip, records: page.length, total: rows.length }, "Fetched page");
      skip += PAGE_SIZE;

      if (this.pageDelayMs > 0) {
        await delay(this.pageDelayMs);
      }
    }

    this.log.info({ records: rows.length }, "Downloaded bus stop catalog");
    return { rows, fetchedAt: new Date() };
  }

  private async fetchPage(skip: number): Promise<BusStop[]> {
    const url = `${this.baseUrl}/BusStops?$skip=${skip}`;
    const maxRetries = this.retryDelaysMs.length;

    for (let attempt = 0; ; attempt++) {
      let res: Awaited<ReturnType<HttpGet>>;
      try {
        res = await this.get(url, {
          headers: { AccountKey: this.apiKey, Accept: "application/json" },
          validateStatus: () => true,
        });
      } catch (err) {
        if (attempt < maxRetries) {
          await this.backoff(attempt, `Network error: ${errorMessage(err)}`);
          continue;
        }
        throw new SourceUnavailableError(
          `DataMall request failed after ${attempt + 1} attempts: ${errorMessage(err)}`,
          { cause: err }
        );
      }

      const { status, statusText } = res;
      if (status >= 200 && status < 300) {
        const parsed = pageSchema.safeParse(res.data);
        if (!parsed.success) {
          throw new SourceUnavailableError(
            `Unexpected DataMall response at $skip=${skip}: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
            { cause: parsed.error }
          );
        }
        return parsed.data.value;
      }

      const retryable = status === 429 || status >= 500;
      if (retryable && attempt < maxRetries) {
        await this.backoff(attempt, `${status} ${statusText ?? ""}`.trim());
        continue;
      }

      throw new SourceUnavailableError(
        `DataMall API error: ${status}${statusText ? ` ${statusText}` : ""}`
      );
    }
  }

  private async backoff(attempt: number, reason: string): Promise<void> {
    const wait = this.retryDelaysMs[attempt] ?? 0;
    this.log.warn({ attempt: attempt + 1, retryInMs: wait }, `${reason}; retrying`);
    await delay(wait);
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
