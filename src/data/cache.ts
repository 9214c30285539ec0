/**
 * Historical data cache manager
 * Persists daily bars to local JSON files to reduce API requests.
 * One file per ticker and lookback horizon, refetched once it is too old.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { Bar } from "../types";
import { logWarn } from "../utils/logger";
import { isOlderThan } from "../utils/timeUtils";

const BarSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  open: z.number().optional(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

const CacheMetadataSchema = z.object({
  ticker: z.string(),
  years: z.number(),
  firstDate: z.string(),
  lastDate: z.string(),
  count: z.number().int(),
  updatedAt: z.number(),
});

const CachedDataSchema = z.object({
  metadata: CacheMetadataSchema,
  bars: z.array(BarSchema),
});

export type CacheMetadata = z.infer<typeof CacheMetadataSchema>;
export type CachedData = z.infer<typeof CachedDataSchema>;

export class DataCache {
  private cacheDir: string;
  private maxAgeHours: number;

  constructor(cacheDir: string = "data/cache", maxAgeHours: number = 24) {
    this.cacheDir = cacheDir;
    this.maxAgeHours = maxAgeHours;
  }

  /**
   * Ensure cache directory exists
   */
  private ensureCacheDir(): void {
    if (!fs.existsSync(this.cacheDir)) {
      fs.mkdirSync(this.cacheDir, { recursive: true });
    }
  }

  /**
   * Get cache file path for ticker and horizon
   */
  getCacheFilePath(ticker: string, years: number): string {
    const safeTicker = ticker.replace(/[^A-Za-z0-9._-]/g, "_");
    return path.join(this.cacheDir, `${safeTicker}_${years}y.json`);
  }

  /**
   * Load cached data from file, or null when missing or unreadable
   */
  loadCache(ticker: string, years: number): CachedData | null {
    const filePath = this.getCacheFilePath(ticker, years);

    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(filePath, "utf-8");
      const parsed = CachedDataSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        logWarn("Ignoring malformed cache file", { file: filePath }, ticker);
        return null;
      }
      return parsed.data;
    } catch (error: unknown) {
      logWarn("Failed to load cache", { file: filePath, error: String(error) }, ticker);
      return null;
    }
  }

  /**
   * Fresh cached bars, or null when missing or older than the max age
   */
  getCachedBars(ticker: string, years: number, now: number = Date.now()): Bar[] | null {
    const cached = this.loadCache(ticker, years);
    if (!cached || cached.bars.length === 0) {
      return null;
    }
    if (isOlderThan(cached.metadata.updatedAt, this.maxAgeHours, now)) {
      return null;
    }
    return cached.bars;
  }

  /**
   * Save bars to the cache file. Write failures only cost a refetch.
   */
  saveCache(ticker: string, years: number, bars: Bar[], now: number = Date.now()): void {
    if (bars.length === 0) {
      return;
    }

    const metadata: CacheMetadata = {
      ticker,
      years,
      firstDate: bars[0].date,
      lastDate: bars[bars.length - 1].date,
      count: bars.length,
      updatedAt: now,
    };

    const filePath = this.getCacheFilePath(ticker, years);

    try {
      this.ensureCacheDir();
      fs.writeFileSync(filePath, JSON.stringify({ metadata, bars }, null, 2), "utf-8");
    } catch (error: unknown) {
      logWarn("Failed to save cache", { file: filePath, error: String(error) }, ticker);
    }
  }
}
