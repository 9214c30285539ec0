/**
 * Backtest Report Service
 * Summarizes per-ticker backtests and renders them as text, JSON or CSV
 */

import * as fs from 'fs';
import * as path from 'path';
import { BacktestResult } from '../types';

export interface BacktestRow {
  ticker: string;
  startDate: string;
  endDate: string;
  bars: number;
  strategyReturn: number;
  buyAndHoldReturn: number;
  annualizedReturn: number;
  sharpeRatio: number;
  maxDrawdown: number;
  winRate: number;
  trades: number;
}

export interface BacktestAverages {
  annualizedReturn: number;
  sharpeRatio: number;
  maxDrawdown: number;
  winRate: number;
  trades: number;
}

export interface BacktestSummaryReport {
  title: string;
  model: string;
  profile: string;
  generatedAt: string;
  rows: BacktestRow[];
  failures: Array<{ ticker: string; error: string }>;
  outperformers: string[];   // Tickers where the strategy beat buy-and-hold
  averages: BacktestAverages | null;
}

export function toBacktestRow(result: BacktestResult): BacktestRow {
  return {
    ticker: result.ticker,
    startDate: result.startDate,
    endDate: result.endDate,
    bars: result.barCount,
    strategyReturn: result.stats.totalReturn,
    buyAndHoldReturn: result.buyAndHoldReturn,
    annualizedReturn: result.stats.annualizedReturn,
    sharpeRatio: result.stats.sharpeRatio,
    maxDrawdown: result.stats.maxDrawdown,
    winRate: result.stats.winRate,
    trades: result.stats.totalTrades,
  };
}

function average(rows: BacktestRow[], pick: (row: BacktestRow) => number): number {
  return rows.reduce((sum, row) => sum + pick(row), 0) / rows.length;
}

/**
 * Generate the summary report; rows are sorted by ticker
 */
export function generateSummaryReport(
  title: string,
  model: string,
  profile: string,
  results: BacktestResult[],
  failures: Array<{ ticker: string; error: string }>,
  now: Date = new Date()
): BacktestSummaryReport {
  const rows = results
    .map(toBacktestRow)
    .sort((a, b) => (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0));

  const averages: BacktestAverages | null =
    rows.length === 0
      ? null
      : {
          annualizedReturn: average(rows, (r) => r.annualizedReturn),
          sharpeRatio: average(rows, (r) => r.sharpeRatio),
          maxDrawdown: average(rows, (r) => r.maxDrawdown),
          winRate: average(rows, (r) => r.winRate),
          trades: average(rows, (r) => r.trades),
        };

  return {
    title,
    model,
    profile,
    generatedAt: now.toISOString(),
    rows,
    failures,
    outperformers: rows.filter((r) => r.strategyReturn > r.buyAndHoldReturn).map((r) => r.ticker),
    averages,
  };
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

/**
 * Format report as text
 * @param years Horizon used to express trades per year, when known
 */
export function formatReportAsText(report: BacktestSummaryReport, years?: number): string {
  const lines: string[] = [];

  lines.push('='.repeat(80));
  lines.push(`${report.title} (model: ${report.model}, profile: ${report.profile})`);
  lines.push('='.repeat(80));
  lines.push('');

  lines.push(
    'Ticker     | Strategy  | Buy&Hold  | Annual    | Sharpe | Max DD    | Win Rate | Trades'
  );
  lines.push('-'.repeat(80));
  for (const row of report.rows) {
    lines.push(
      `${row.ticker.padEnd(10)} | ` +
      `${formatPercent(row.strategyReturn).padStart(9)} | ` +
      `${formatPercent(row.buyAndHoldReturn).padStart(9)} | ` +
      `${formatPercent(row.annualizedReturn).padStart(9)} | ` +
      `${row.sharpeRatio.toFixed(2).padStart(6)} | ` +
      `${formatPercent(row.maxDrawdown).padStart(9)} | ` +
      `${formatPercent(row.winRate).padStart(8)} | ` +
      `${String(row.trades).padStart(6)}`
    );
  }
  lines.push('');

  if (report.rows.length > 0) {
    lines.push(
      `Strategy beat buy-and-hold on ${report.outperformers.length} of ${report.rows.length} tickers` +
      (report.outperformers.length > 0 ? `: ${report.outperformers.join(', ')}` : '')
    );
  }

  if (report.averages) {
    lines.push('');
    lines.push('AVERAGES');
    lines.push('-'.repeat(80));
    lines.push(`Annualized Return: ${formatPercent(report.averages.annualizedReturn)}`);
    lines.push(`Sharpe Ratio: ${report.averages.sharpeRatio.toFixed(2)}`);
    lines.push(`Max Drawdown: ${formatPercent(report.averages.maxDrawdown)}`);
    lines.push(`Win Rate: ${formatPercent(report.averages.winRate)}`);
    if (years !== undefined && years > 0) {
      lines.push(`Trades per Year: ${(report.averages.trades / years).toFixed(1)}`);
    }
  }

  if (report.failures.length > 0) {
    lines.push('');
    lines.push('FAILED TICKERS');
    lines.push('-'.repeat(80));
    for (const failure of report.failures) {
      lines.push(`${failure.ticker}: ${failure.error}`);
    }
  }

  return lines.join('\n');
}

function ensureDir(outputPath: string): void {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Export report to JSON file
 */
export function exportReportToJSON(report: BacktestSummaryReport, outputPath: string): void {
  ensureDir(outputPath);
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2), 'utf-8');
}

/**
 * One line per ticker; ratios as plain fractions
 */
export function formatReportAsCSV(report: BacktestSummaryReport): string {
  const lines: string[] = [];
  lines.push(
    'Ticker,Start,End,Bars,Strategy Return,Buy and Hold Return,Annualized Return,Sharpe,Max Drawdown,Win Rate,Trades'
  );
  for (const row of report.rows) {
    lines.push(
      [
        row.ticker,
        row.startDate,
        row.endDate,
        row.bars,
        row.strategyReturn.toFixed(6),
        row.buyAndHoldReturn.toFixed(6),
        row.annualizedReturn.toFixed(6),
        row.sharpeRatio.toFixed(4),
        row.maxDrawdown.toFixed(6),
        row.winRate.toFixed(4),
        row.trades,
      ].join(',')
    );
  }
  return lines.join('\n');
}

/**
 * Export report to CSV
 */
export function exportReportToCSV(report: BacktestSummaryReport, outputPath: string): void {
  ensureDir(outputPath);
  fs.writeFileSync(outputPath, formatReportAsCSV(report), 'utf-8');
}
