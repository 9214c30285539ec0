/**
 * Performance metrics
 * Pure reductions of a simulation into return, win rate, Sharpe and drawdown.
 */

import { PerformanceStats, SimulationResult, Trade } from '../../types';

export interface MetricsOptions {
  riskFreeRate: number;       // Annual
  tradingDaysPerYear: number;
}

export const DEFAULT_METRICS_OPTIONS: MetricsOptions = {
  riskFreeRate: 0.02,
  tradingDaysPerYear: 252,
};

export function totalReturn(trades: Trade[]): number {
  return trades.reduce((capital, t) => capital * (1 + t.profitFraction), 1) - 1;
}

export function winRate(trades: Trade[]): number {
  if (trades.length === 0) {
    return 0;
  }
  return trades.filter((t) => t.profitFraction > 0).length / trades.length;
}

/**
 * (1 + total)^(periodsPerYear / barCount) - 1, 0 when the base or bar count is not positive
 */
export function annualizedReturn(total: number, barCount: number, periodsPerYear: number = 252): number {
  const base = 1 + total;
  if (base <= 0 || barCount <= 0) {
    return 0;
  }
  return Math.pow(base, periodsPerYear / barCount) - 1;
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation
 */
function stdDev(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const m = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - m) ** 2)));
}

export function sharpeRatio(
  dailyReturns: number[],
  options: MetricsOptions = DEFAULT_METRICS_OPTIONS
): number {
  const std = stdDev(dailyReturns);
  if (std === 0) {
    return 0;
  }
  const dailyRiskFree = options.riskFreeRate / options.tradingDaysPerYear;
  const excess = mean(dailyReturns.map((r) => r - dailyRiskFree));
  return (Math.sqrt(options.tradingDaysPerYear) * excess) / std;
}

/**
 * Worst peak-to-trough decline of the compounded daily-return curve (<= 0).
 * The curve starts at 1.0 before the first return.
 */
export function maxDrawdown(dailyReturns: number[]): number {
  let equity = 1;
  let peak = 1;
  let worst = 0;

  for (const r of dailyReturns) {
    equity *= 1 + r;
    peak = Math.max(peak, equity);
    worst = Math.min(worst, (equity - peak) / peak);
  }

  return worst;
}

export function computePerformance(
  simulation: SimulationResult,
  barCount: number,
  options: MetricsOptions = DEFAULT_METRICS_OPTIONS
): PerformanceStats {
  const total = simulation.finalCapital - 1;
  const winningTrades = simulation.trades.filter((t) => t.profitFraction > 0).length;

  return {
    totalReturn: total,
    winRate: winRate(simulation.trades),
    annualizedReturn: annualizedReturn(total, barCount, options.tradingDaysPerYear),
    sharpeRatio: sharpeRatio(simulation.dailyReturns, options),
    maxDrawdown: maxDrawdown(simulation.dailyReturns),
    totalTrades: simulation.trades.length,
    winningTrades,
  };
}
