/**
 * The canonical bars -> indicators -> signals -> simulation -> metrics chain.
 * Every command and the optimizer go through these functions.
 */

import { ModelConfig, requiredLookback } from '../config/config';
import { IndicatorBuildOptions, buildIndicatorRows } from '../data/indicatorBuilders';
import { BacktestResult, Bar, SignalBar, TickerAnalysis } from '../types';
import { InsufficientDataError } from '../utils/errors';
import { DEFAULT_METRICS_OPTIONS, MetricsOptions, computePerformance } from './metrics/performanceMetrics';
import { classifyRegime } from './regime/barometer';
import { recommend } from './regime/recommendation';
import { detectRecovery } from './regime/recovery';
import { simulatePositions } from './simulator/positionSimulator';
import { StrategyProfile } from './strategy/strategyProfiles';

export function buildSignalBars(
  series: Bar[],
  config: ModelConfig,
  options: IndicatorBuildOptions = {}
): SignalBar[] {
  const rows = buildIndicatorRows(series, config, options);
  return rows.map((row, i) => ({
    date: row.date,
    close: row.close,
    regime: classifyRegime(row, config),
    recovery: detectRecovery(row, i > 0 ? rows[i - 1] : undefined, config),
  }));
}

/**
 * Index of the first bar where both labels are defined, or -1
 */
export function firstEvaluableIndex(signals: SignalBar[]): number {
  return signals.findIndex(
    (s) => s.regime !== 'INSUFFICIENT_DATA' && s.recovery !== 'INSUFFICIENT_DATA'
  );
}

export interface BacktestOptions extends IndicatorBuildOptions {
  metrics?: MetricsOptions;
}

/**
 * Backtest one ticker over its evaluable window (warm-up bars dropped)
 * @throws InsufficientDataError when the series is shorter than the longest
 * lookback, or fewer than two bars are evaluable
 */
export function runBacktest(
  ticker: string,
  series: Bar[],
  config: ModelConfig,
  profile: StrategyProfile,
  options: BacktestOptions = {}
): BacktestResult {
  const required = requiredLookback(config);
  if (series.length < required) {
    throw new InsufficientDataError(ticker, required, series.length);
  }

  const signals = buildSignalBars(series, config, options);
  const start = firstEvaluableIndex(signals);
  const window = start >= 0 ? signals.slice(start) : [];

  if (window.length < 2) {
    throw new InsufficientDataError(ticker, start >= 0 ? start + 2 : required + 1, series.length);
  }

  const simulation = simulatePositions(window, profile, { tag: ticker });
  const first = window[0];
  const last = window[window.length - 1];

  return {
    ticker,
    startDate: first.date,
    endDate: last.date,
    barCount: window.length,
    buyAndHoldReturn: last.close / first.close - 1,
    simulation,
    stats: computePerformance(simulation, window.length, options.metrics ?? DEFAULT_METRICS_OPTIONS),
  };
}

/**
 * Latest regime, recovery signal and recommendation for one ticker.
 * Short histories resolve to INSUFFICIENT_DATA rather than failing.
 */
export function analyzeLatest(
  ticker: string,
  series: Bar[],
  config: ModelConfig,
  options: IndicatorBuildOptions = {}
): TickerAnalysis {
  if (series.length === 0) {
    throw new InsufficientDataError(ticker, requiredLookback(config), 0);
  }

  const last = series[series.length - 1];
  if (series.length < requiredLookback(config)) {
    return {
      ticker,
      date: last.date,
      close: last.close,
      regime: 'INSUFFICIENT_DATA',
      recovery: 'INSUFFICIENT_DATA',
      recommendation: 'HOLD',
    };
  }

  const signals = buildSignalBars(series, config, options);
  const latest = signals[signals.length - 1];

  return {
    ticker,
    date: latest.date,
    close: latest.close,
    regime: latest.regime,
    recovery: latest.recovery,
    recommendation: recommend(latest.regime, latest.recovery),
  };
}
