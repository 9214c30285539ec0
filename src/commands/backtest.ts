/**
 * Backtest commands: batch backtest against buy-and-hold, and the long-horizon
 * variant with risk metrics. Both can export the summary under reports/.
 */

import { getModelPreset } from "../config/modelPresets";
import { getStrategyProfile } from "../core/strategy/strategyProfiles";
import {
  BacktestSummaryReport,
  exportReportToCSV,
  exportReportToJSON,
  formatReportAsText,
  generateSummaryReport,
} from "../services/backtestReportService";
import { backtestTickers } from "../services/backtestService";
import { logInfo } from "../utils/logger";
import { ParsedArgs, intOption, listOption, macdSignalSpanOption, stringOption } from "./args";
import { CommandContext } from "./context";
import { banner } from "./format";

export const BATCH_TICKERS = ["0050.TW", "006208.TW", "2330.TW", "VOO", "QQQ", "MSFT", "AAPL"];
export const LONG_HORIZON_TICKERS = ["2330.TW", "AAPL", "0050.TW", "QQQ"];

interface BacktestRun {
  title: string;
  defaultTickers: string[];
  defaultYears: number;
  reportPrefix: string;
}

async function runBacktestCommand(
  run: BacktestRun,
  args: ParsedArgs,
  ctx: CommandContext
): Promise<BacktestSummaryReport> {
  const preset = getModelPreset(stringOption(args, "model", "conservative"));
  const profile = getStrategyProfile(stringOption(args, "profile", preset.profile));
  const tickers = listOption(args, "tickers", run.defaultTickers);
  const years = intOption(args, "years", run.defaultYears);

  for (const line of banner(`${run.title}: ${years} years`)) ctx.print(line);
  ctx.print(`Model: ${preset.name} | Profile: ${profile.name}`);
  ctx.print(`Tickers: ${tickers.join(", ")}`);
  ctx.print("");

  const { results, failures } = await backtestTickers(ctx.provider, tickers, {
    years,
    config: preset.config,
    profile,
    metrics: ctx.settings.evaluation,
    concurrency: ctx.settings.workers.count,
    timeoutMs: ctx.settings.workers.taskTimeoutMs,
    macdSignalSpan: macdSignalSpanOption(args),
  });

  const report = generateSummaryReport(run.title, preset.name, profile.name, results, failures);
  ctx.print(formatReportAsText(report, years));

  if (args.flags.has("export")) {
    const timestamp = report.generatedAt.replace(/[:.]/g, "-");
    const base = `reports/${run.reportPrefix}-${preset.name}-${timestamp}`;
    exportReportToJSON(report, `${base}.json`);
    exportReportToCSV(report, `${base}.csv`);
    logInfo("Reports exported", { json: `${base}.json`, csv: `${base}.csv` });
  }

  return report;
}

export function runBatchBacktest(args: ParsedArgs, ctx: CommandContext): Promise<BacktestSummaryReport> {
  return runBacktestCommand(
    { title: "Batch backtest", defaultTickers: BATCH_TICKERS, defaultYears: 20, reportPrefix: "backtest" },
    args,
    ctx
  );
}

export function runLongBacktest(args: ParsedArgs, ctx: CommandContext): Promise<BacktestSummaryReport> {
  return runBacktestCommand(
    { title: "Long-horizon backtest", defaultTickers: LONG_HORIZON_TICKERS, defaultYears: 10, reportPrefix: "long-backtest" },
    args,
    ctx
  );
}
