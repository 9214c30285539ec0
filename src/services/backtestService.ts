/**
 * Backtest Service
 * Fetches and backtests many tickers through the worker pool
 */

import { ModelConfig } from '../config/config';
import { MetricsOptions } from '../core/metrics/performanceMetrics';
import { runBacktest } from '../core/pipeline';
import { StrategyProfile } from '../core/strategy/strategyProfiles';
import { MacdSignalSpan } from '../data/indicatorBuilders';
import { MarketDataProvider } from '../data/fetcher';
import { BacktestResult } from '../types';
import { runPool, sortByTicker } from '../utils/workerPool';
import { loadSeries } from './dataService';

export interface BatchBacktestOptions {
  years: number;
  config: ModelConfig;
  profile: StrategyProfile;
  metrics: MetricsOptions;
  concurrency: number;
  timeoutMs: number;
  macdSignalSpan?: MacdSignalSpan;
}

export interface BatchBacktestResult {
  results: BacktestResult[];
  failures: Array<{ ticker: string; error: string }>;
}

export async function backtestTickers(
  provider: MarketDataProvider,
  tickers: string[],
  options: BatchBacktestOptions
): Promise<BatchBacktestResult> {
  const outcomes = await runPool(
    tickers.map((ticker) => ({
      key: ticker,
      run: async (signal: AbortSignal): Promise<BacktestResult> => {
        const series = await loadSeries(provider, ticker, options.years, signal);
        return runBacktest(ticker, series, options.config, options.profile, {
          metrics: options.metrics,
          macdSignalSpan: options.macdSignalSpan,
        });
      },
    })),
    { concurrency: options.concurrency, timeoutMs: options.timeoutMs }
  );

  const results: BacktestResult[] = [];
  const failures: Array<{ ticker: string; error: string }> = [];
  for (const outcome of sortByTicker(outcomes)) {
    if (outcome.ok) {
      results.push(outcome.value);
    } else {
      failures.push({ ticker: outcome.ticker, error: outcome.error });
    }
  }
  return { results, failures };
}
