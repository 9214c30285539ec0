/**
 * Data Service
 * Fetches and validates daily series for many tickers at once.
 * One ticker's failure never aborts the others.
 */

import { globalConfig } from '../config/globalConfig';
import { DataFetcher, MarketDataProvider } from '../data/fetcher';
import { Bar, TickerOutcome } from '../types';
import { DataFetchError } from '../utils/errors';
import { logDebug, logWarn } from '../utils/logger';
import { runPool } from '../utils/workerPool';
import { validateSeries } from './seriesValidationService';

export function createDefaultProvider(): MarketDataProvider {
  return new DataFetcher({
    baseUrl: globalConfig.provider.baseUrl,
    useCache: globalConfig.cache.enabled,
    cacheDir: globalConfig.cache.directory,
    cacheMaxAgeHours: globalConfig.cache.maxAgeHours,
    requestTimeoutMs: globalConfig.provider.requestTimeoutMs,
    requestDelayMs: globalConfig.provider.requestDelayMs,
  });
}

export interface FetchOptions {
  concurrency?: number;
  timeoutMs?: number;
}

/**
 * Fetch one ticker and reject series that fail validation
 * @throws DataFetchError
 */
export async function loadSeries(
  provider: MarketDataProvider,
  ticker: string,
  years: number,
  signal?: AbortSignal
): Promise<Bar[]> {
  const bars = await provider.fetchDailyBars(ticker, years, signal);
  const validation = validateSeries(bars);

  for (const warning of validation.warnings) {
    logDebug(warning, undefined, ticker);
  }
  if (!validation.isValid) {
    throw new DataFetchError(ticker, `invalid series (${validation.errors[0]})`);
  }
  return bars;
}

/**
 * Fetch many tickers through the worker pool.
 * Returns the usable series plus the per-ticker failures.
 */
export async function fetchUniverse(
  provider: MarketDataProvider,
  tickers: string[],
  years: number,
  options: FetchOptions = {}
): Promise<{ series: Map<string, Bar[]>; failures: Array<{ ticker: string; error: string }> }> {
  const outcomes: TickerOutcome<Bar[]>[] = await runPool(
    tickers.map((ticker) => ({
      key: ticker,
      run: (signal: AbortSignal) => loadSeries(provider, ticker, years, signal),
    })),
    {
      concurrency: options.concurrency ?? globalConfig.workers.count,
      timeoutMs: options.timeoutMs ?? globalConfig.workers.taskTimeoutMs,
    }
  );

  const series = new Map<string, Bar[]>();
  const failures: Array<{ ticker: string; error: string }> = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      series.set(outcome.ticker, outcome.value);
    } else {
      failures.push({ ticker: outcome.ticker, error: outcome.error });
    }
  }

  if (failures.length > 0) {
    logWarn(`${failures.length} of ${tickers.length} tickers could not be loaded`);
  }
  return { series, failures };
}
