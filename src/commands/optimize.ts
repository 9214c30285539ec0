/**
 * Optimize command: random search over the parameter space
 */

import { getStrategyProfile } from "../core/strategy/strategyProfiles";
import { OptimizerResult, isObjective, optimize, OBJECTIVES } from "../optimizer/optimizer";
import { DEFAULT_PARAMETER_SPACE, spaceSize } from "../optimizer/parameterSpace";
import { fetchUniverse } from "../services/dataService";
import { formatPercent } from "../services/backtestReportService";
import { ParsedArgs, intOption, listOption, macdSignalSpanOption, stringOption } from "./args";
import { CommandContext } from "./context";
import { banner } from "./format";

export async function runOptimize(args: ParsedArgs, ctx: CommandContext): Promise<OptimizerResult> {
  const objective = stringOption(args, "objective", "max_return");
  if (!isObjective(objective)) {
    throw new Error(`Unknown objective "${objective}". Available objectives: ${OBJECTIVES.join(", ")}`);
  }
  const profile = getStrategyProfile(stringOption(args, "profile", "conservative"));
  const trials = intOption(args, "trials", ctx.settings.optimizer.trials);
  const years = intOption(args, "years", ctx.settings.optimizer.years);
  const tickers = listOption(args, "tickers", ctx.settings.optimizer.universe);
  const seedOption = args.options.get("seed");
  const seed = seedOption === undefined ? undefined : intOption(args, "seed", 1);

  for (const line of banner(`Parameter optimization (${objective})`)) ctx.print(line);
  ctx.print(`Trials: ${trials} of ${spaceSize(DEFAULT_PARAMETER_SPACE)} possible configs`);
  ctx.print(`Universe: ${tickers.join(", ")} (${years} years) | Profile: ${profile.name}`);
  if (seed !== undefined) ctx.print(`Seed: ${seed}`);
  ctx.print("");

  const { series, failures } = await fetchUniverse(ctx.provider, tickers, years, {
    concurrency: ctx.settings.workers.count,
    timeoutMs: ctx.settings.workers.taskTimeoutMs,
  });
  for (const failure of failures) {
    ctx.print(`Skipping ${failure.ticker}: ${failure.error}`);
  }
  if (series.size === 0) {
    throw new Error("No ticker in the universe could be loaded");
  }

  const result = await optimize(series, DEFAULT_PARAMETER_SPACE, {
    trials,
    objective,
    profile,
    metrics: ctx.settings.evaluation,
    concurrency: ctx.settings.workers.count,
    seed,
    macdSignalSpan: macdSignalSpanOption(args),
  });

  ctx.print(`Evaluated ${result.results.length} configs, skipped ${result.skipped} with maShort >= maLong`);
  ctx.print("");

  if (!result.best) {
    ctx.print("No config produced a result.");
    return result;
  }

  const { best } = result;
  for (const line of banner(`🏆 Best config (trial ${best.trial})`)) ctx.print(line);
  ctx.print(`Score: ${best.score.toFixed(4)}`);
  ctx.print(`Geometric mean return: ${formatPercent(best.aggregate.geometricReturn)}`);
  ctx.print(`Average win rate: ${formatPercent(best.aggregate.avgWinRate)}`);
  ctx.print(`Average Sharpe: ${best.aggregate.avgSharpe.toFixed(2)}`);
  ctx.print(`Average max drawdown: ${formatPercent(best.aggregate.avgMaxDrawdown)}`);
  ctx.print(`Trades: ${best.aggregate.totalTrades} over ${best.aggregate.tickerCount} tickers`);
  ctx.print("");
  ctx.print(JSON.stringify(best.config, null, 2));

  return result;
}
