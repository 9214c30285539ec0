/**
 * Random-search parameter optimizer
 * Samples configs from a discrete space, backtests each on every ticker of a
 * pre-fetched universe, aggregates and keeps the best-scoring config.
 */

import { ModelConfig, validateModelConfig } from "../config/config";
import { MacdSignalSpan } from "../data/indicatorBuilders";
import { MetricsOptions } from "../core/metrics/performanceMetrics";
import { runBacktest } from "../core/pipeline";
import { StrategyProfile } from "../core/strategy/strategyProfiles";
import { Bar, PerformanceStats } from "../types";
import { InsufficientDataError } from "../utils/errors";
import { logDebug, logInfo } from "../utils/logger";
import { SeededRandom } from "../utils/random";
import { runPool } from "../utils/workerPool";
import { PARAMETER_NAMES, ParameterSpace } from "./parameterSpace";

export const OBJECTIVES = ["max_return", "high_winrate", "max_sharpe"] as const;

export type Objective = (typeof OBJECTIVES)[number];

export function isObjective(value: string): value is Objective {
  return OBJECTIVES.some((o) => o === value);
}

export interface AggregateStats {
  geometricReturn: number;      // Geometric mean of (1 + totalReturn) - 1
  geometricAnnualized: number;
  avgWinRate: number;
  avgSharpe: number;
  avgMaxDrawdown: number;
  totalTrades: number;
  tickerCount: number;
}

export interface TrialResult {
  trial: number;
  config: ModelConfig;
  aggregate: AggregateStats;
  score: number;
}

export interface OptimizerOptions {
  trials: number;
  objective: Objective;
  profile: StrategyProfile;
  metrics: MetricsOptions;
  concurrency: number;
  seed?: number;
  macdSignalSpan?: MacdSignalSpan;
}

export interface OptimizerResult {
  best: TrialResult | null;
  results: TrialResult[];
  skipped: number;        // Trials rejected for maShort >= maLong
}

/**
 * Draw one candidate. Returns null when the sample breaks the MA ordering.
 */
export function sampleConfig(space: ParameterSpace, rng: SeededRandom): ModelConfig | null {
  const raw: Partial<Record<string, number>> = {};
  for (const name of PARAMETER_NAMES) {
    const candidates = space[name];
    if (candidates.length > 0) {
      raw[name] = rng.pick(candidates);
    }
  }

  if (raw.maShort === undefined || raw.maLong === undefined || raw.maShort >= raw.maLong) {
    return null;
  }
  return validateModelConfig(raw, "trial");
}

/**
 * Geometric mean of (1 + r) minus 1. A product at or below zero means at
 * least one total loss, scored as -1.
 */
export function geometricMean(values: number[]): number {
  const product = values.reduce((p, v) => p * (1 + v), 1);
  return product <= 0 ? -1 : Math.pow(product, 1 / values.length) - 1;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Backtest one config over the whole universe.
 * Tickers too short for the config are left out of the aggregate.
 */
export function evaluateConfig(
  config: ModelConfig,
  universe: ReadonlyMap<string, Bar[]>,
  options: Pick<OptimizerOptions, "profile" | "metrics" | "macdSignalSpan">
): AggregateStats | null {
  const stats: PerformanceStats[] = [];
  for (const [ticker, series] of universe) {
    try {
      const result = runBacktest(ticker, series, config, options.profile, {
        metrics: options.metrics,
        macdSignalSpan: options.macdSignalSpan,
      });
      stats.push(result.stats);
    } catch (error: unknown) {
      if (!(error instanceof InsufficientDataError)) {
        throw error;
      }
      logDebug("Ticker skipped for trial", { reason: error.message }, ticker);
    }
  }

  if (stats.length === 0) {
    return null;
  }

  return {
    geometricReturn: geometricMean(stats.map((s) => s.totalReturn)),
    geometricAnnualized: geometricMean(stats.map((s) => s.annualizedReturn)),
    avgWinRate: mean(stats.map((s) => s.winRate)),
    avgSharpe: mean(stats.map((s) => s.sharpeRatio)),
    avgMaxDrawdown: mean(stats.map((s) => s.maxDrawdown)),
    totalTrades: stats.reduce((n, s) => n + s.totalTrades, 0),
    tickerCount: stats.length,
  };
}

export function scoreAggregate(aggregate: AggregateStats, objective: Objective): number {
  switch (objective) {
    case "max_return":
      return aggregate.geometricReturn;
    case "high_winrate":
      // Win rate first, weighted by compounded return
      return aggregate.avgWinRate * (1 + aggregate.geometricReturn);
    case "max_sharpe":
      return aggregate.avgSharpe;
  }
}

/**
 * Run the search. All configs are drawn up front so the sequence only
 * depends on the seed, whatever order the pool finishes in.
 */
export async function optimize(
  universe: ReadonlyMap<string, Bar[]>,
  space: ParameterSpace,
  options: OptimizerOptions
): Promise<OptimizerResult> {
  const rng = new SeededRandom(options.seed);

  const candidates: Array<{ trial: number; config: ModelConfig }> = [];
  let skipped = 0;
  for (let trial = 1; trial <= options.trials; trial++) {
    const config = sampleConfig(space, rng);
    if (config) {
      candidates.push({ trial, config });
    } else {
      skipped++;
    }
  }

  logInfo("Optimizer started", {
    trials: options.trials,
    candidates: candidates.length,
    skipped,
    tickers: universe.size,
    objective: options.objective,
  });

  const outcomes = await runPool(
    candidates.map(({ trial, config }) => ({
      key: `trial-${trial}`,
      run: async (): Promise<TrialResult | null> => {
        const aggregate = evaluateConfig(config, universe, options);
        return aggregate
          ? { trial, config, aggregate, score: scoreAggregate(aggregate, options.objective) }
          : null;
      },
    })),
    { concurrency: options.concurrency, timeoutMs: 0 }
  );

  const results: TrialResult[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok && outcome.value) {
      results.push(outcome.value);
    }
  }

  // Strictly greater: the earliest trial wins a tie
  let best: TrialResult | null = null;
  for (const result of results) {
    if (!best || result.score > best.score) {
      best = result;
    }
  }

  return { best, results, skipped };
}
