/**
 * Scan Service
 * Runs the latest-bar analysis over a ticker universe with one model, or two
 * models whose recommendations are combined into a single verdict.
 */

import { z } from 'zod';
import scanUniverseData from '../config/scanUniverse.json';
import { ModelConfig } from '../config/config';
import { analyzeLatest } from '../core/pipeline';
import { combineRecommendations } from '../core/regime/recommendation';
import { MarketDataProvider } from '../data/fetcher';
import { MacdSignalSpan } from '../data/indicatorBuilders';
import { normalizeTicker } from '../data/holdList';
import { CombinedRecommendation, TickerAnalysis, TickerOutcome } from '../types';
import { runPool, sortByTicker } from '../utils/workerPool';
import { loadSeries } from './dataService';

const ScanUniverseSchema = z.object({
  us: z.array(z.string()),
  tw: z.array(z.string()),
});

export type ScanUniverse = z.infer<typeof ScanUniverseSchema>;

export const defaultScanUniverse: ScanUniverse = ScanUniverseSchema.parse(scanUniverseData);

/**
 * Curated scan list (US and Taiwan) unioned with the held tickers, sorted
 */
export function buildScanList(held: string[], universe: ScanUniverse = defaultScanUniverse): string[] {
  const all = new Set([...universe.us, ...universe.tw, ...held].map(normalizeTicker));
  return [...all].sort();
}

export interface TickerScan {
  ticker: string;
  date: string;
  close: number;
  analyses: TickerAnalysis[];
  // Only in dual-model scans
  combined?: CombinedRecommendation;
}

export interface ScanOptions {
  years: number;
  concurrency: number;
  timeoutMs: number;
  macdSignalSpan?: MacdSignalSpan;
}

/**
 * Fetch once per ticker, analyze with every model
 */
export async function scanTickers(
  provider: MarketDataProvider,
  tickers: string[],
  models: ModelConfig[],
  options: ScanOptions
): Promise<TickerOutcome<TickerScan>[]> {
  if (models.length === 0 || models.length > 2) {
    throw new Error(`A scan takes one or two models, got ${models.length}`);
  }

  const outcomes = await runPool(
    tickers.map((ticker) => ({
      key: ticker,
      run: async (signal: AbortSignal): Promise<TickerScan> => {
        const series = await loadSeries(provider, ticker, options.years, signal);
        const analyses = models.map((config) =>
          analyzeLatest(ticker, series, config, { macdSignalSpan: options.macdSignalSpan })
        );
        const [first, second] = analyses;
        const scan: TickerScan = { ticker, date: first.date, close: first.close, analyses };
        if (second && isConclusive(first) && isConclusive(second)) {
          scan.combined = combineRecommendations(first.recommendation, second.recommendation);
        }
        return scan;
      },
    })),
    { concurrency: options.concurrency, timeoutMs: options.timeoutMs }
  );

  return sortByTicker(outcomes);
}

function isConclusive(analysis: TickerAnalysis): boolean {
  return analysis.regime !== 'INSUFFICIENT_DATA';
}

export interface ScanReport {
  holdings: Array<{ ticker: string; scan?: TickerScan; error?: string }>;
  buys: TickerScan[];
  sells: TickerScan[];
  failures: Array<{ ticker: string; error: string }>;
}

/**
 * Direction of a scan result: +1 buy side, -1 sell side, 0 nothing to do
 */
export function scanDirection(scan: TickerScan): number {
  if (scan.analyses.length > 1) {
    switch (scan.combined) {
      case 'STRONG_BUY':
      case 'BUY':
        return 1;
      case 'REDUCE':
      case 'STRONG_SELL':
        return -1;
      default:
        return 0;
    }
  }
  const [single] = scan.analyses;
  if (!isConclusive(single)) return 0;
  return single.recommendation === 'ENTER' ? 1 : single.recommendation === 'EXIT' ? -1 : 0;
}

/**
 * Split scan outcomes into the holdings report and the opportunity lists
 */
export function buildScanReport(outcomes: TickerOutcome<TickerScan>[], held: string[]): ScanReport {
  const heldSet = new Set(held.map(normalizeTicker));
  const byTicker = new Map(outcomes.map((o) => [o.ticker, o]));

  const holdings = [...heldSet].sort().map((ticker): ScanReport['holdings'][number] => {
    const outcome = byTicker.get(ticker);
    if (!outcome) return { ticker, error: 'not scanned' };
    return outcome.ok ? { ticker, scan: outcome.value } : { ticker, error: outcome.error };
  });

  const buys: TickerScan[] = [];
  const sells: TickerScan[] = [];
  const failures: Array<{ ticker: string; error: string }> = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push({ ticker: outcome.ticker, error: outcome.error });
      continue;
    }
    if (heldSet.has(outcome.ticker)) continue;

    const direction = scanDirection(outcome.value);
    if (direction > 0) buys.push(outcome.value);
    if (direction < 0) sells.push(outcome.value);
  }

  // Strongest signals first
  const strength = (s: TickerScan): number => (s.combined === 'STRONG_BUY' || s.combined === 'STRONG_SELL' ? 0 : 1);
  buys.sort((a, b) => strength(a) - strength(b));
  sells.sort((a, b) => strength(a) - strength(b));

  return { holdings, buys, sells, failures };
}
