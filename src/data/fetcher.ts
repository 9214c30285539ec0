/**
 * Daily bar fetcher
 * Historical data from the Yahoo Finance chart API, adjusted for splits and
 * dividends. Includes local cache to reduce API requests.
 */

import axios from "axios";
import { z } from "zod";
import { Bar } from "../types";
import { DataFetchError, errorMessage } from "../utils/errors";
import { logDebug } from "../utils/logger";
import { sleep, toIsoDate, yearsAgoSeconds } from "../utils/timeUtils";
import { DataCache } from "./cache";

/**
 * Anything that can supply a ticker's daily history
 */
export interface MarketDataProvider {
  fetchDailyBars(ticker: string, years: number, signal?: AbortSignal): Promise<Bar[]>;
}

const nullableNumbers = z.array(z.number().nullable());

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ gmtoffset: z.number().optional() }).passthrough(),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z
              .array(
                z.object({
                  open: nullableNumbers.optional(),
                  high: nullableNumbers,
                  low: nullableNumbers,
                  close: nullableNumbers,
                  volume: nullableNumbers.optional(),
                })
              )
              .min(1),
            adjclose: z.array(z.object({ adjclose: nullableNumbers })).optional(),
          }),
        })
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

/**
 * Turn a chart API payload into a sorted, de-duplicated Bar series.
 * Prices are scaled by adjclose/close; bars with a missing price are dropped.
 */
export function parseChartResponse(ticker: string, payload: unknown): Bar[] {
  const parsed = ChartResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DataFetchError(ticker, `unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
  }

  const { chart } = parsed.data;
  if (chart.error) {
    throw new DataFetchError(ticker, `${chart.error.code}: ${chart.error.description}`);
  }

  const result = chart.result?.[0];
  if (!result || !result.timestamp || result.timestamp.length === 0) {
    throw new DataFetchError(ticker, "no data returned");
  }

  const quote = result.indicators.quote[0];
  const adjclose = result.indicators.adjclose?.[0]?.adjclose;
  const offset = result.meta.gmtoffset ?? 0;

  const byDate = new Map<string, Bar>();
  result.timestamp.forEach((ts, i) => {
    const high = quote.high[i];
    const low = quote.low[i];
    const close = quote.close[i];
    if (high == null || low == null || close == null || !(close > 0)) {
      return;
    }

    const adjusted = adjclose?.[i];
    const factor = adjusted != null && adjusted > 0 ? adjusted / close : 1;
    const open = quote.open?.[i];

    const bar: Bar = {
      date: toIsoDate(ts, offset),
      high: high * factor,
      low: low * factor,
      close: close * factor,
      volume: quote.volume?.[i] ?? 0,
    };
    if (open != null) {
      bar.open = open * factor;
    }
    byDate.set(bar.date, bar);
  });

  const bars = Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  if (bars.length === 0) {
    throw new DataFetchError(ticker, "no usable bars returned");
  }
  return bars;
}

export interface DataFetcherOptions {
  baseUrl?: string;
  useCache?: boolean;
  cacheDir?: string;
  cacheMaxAgeHours?: number;
  requestTimeoutMs?: number;
  requestDelayMs?: number;
}

export class DataFetcher implements MarketDataProvider {
  private baseUrl: string;
  private cache: DataCache;
  private useCache: boolean;
  private requestTimeoutMs: number;
  private requestDelayMs: number;
  // Earliest time the next request may start
  private nextSlot: number = 0;

  constructor(options: DataFetcherOptions = {}) {
    this.baseUrl = options.baseUrl ?? "https://query1.finance.yahoo.com";
    this.useCache = options.useCache ?? true;
    this.cache = new DataCache(options.cacheDir, options.cacheMaxAgeHours);
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15_000;
    this.requestDelayMs = options.requestDelayMs ?? 100;
  }

  /**
   * Fetch `years` of daily bars, served from cache when fresh
   * @throws DataFetchError when the provider fails or returns nothing usable
   */
  async fetchDailyBars(ticker: string, years: number, signal?: AbortSignal): Promise<Bar[]> {
    if (this.useCache) {
      const cached = this.cache.getCachedBars(ticker, years);
      if (cached) {
        logDebug(`Cache hit: ${cached.length} bars`, { years }, ticker);
        return cached;
      }
      logDebug("Cache miss", { years }, ticker);
    }

    const bars = await this.fetchFromAPI(ticker, years, signal);

    if (this.useCache) {
      this.cache.saveCache(ticker, years, bars);
    }
    return bars;
  }

  /**
   * Spaces request starts `requestDelayMs` apart without holding up anything else
   */
  private async throttle(): Promise<void> {
    const now = Date.now();
    const wait = Math.max(0, this.nextSlot - now);
    this.nextSlot = Math.max(now, this.nextSlot) + this.requestDelayMs;
    if (wait > 0) {
      await sleep(wait);
    }
  }

  private async fetchFromAPI(ticker: string, years: number, signal?: AbortSignal): Promise<Bar[]> {
    await this.throttle();

    let payload: unknown;
    try {
      const response = await axios.get<unknown>(
        `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}`,
        {
          params: {
            interval: "1d",
            period1: yearsAgoSeconds(years),
            period2: Math.floor(Date.now() / 1000),
            events: "div,split",
          },
          headers: { "User-Agent": "Mozilla/5.0" },
          timeout: this.requestTimeoutMs,
          signal,
        }
      );
      payload = response.data;
    } catch (error: unknown) {
      throw new DataFetchError(ticker, errorMessage(error), { cause: error });
    }

    return parseChartResponse(ticker, payload);
  }
}
