/**
 * Diagnose command: latest barometer reading for one ticker
 */

import { getModelPreset } from "../config/modelPresets";
import { analyzeLatest } from "../core/pipeline";
import { normalizeTicker } from "../data/holdList";
import { loadSeries } from "../services/dataService";
import { TickerAnalysis } from "../types";
import { ParsedArgs, macdSignalSpanOption, stringOption } from "./args";
import { CommandContext } from "./context";
import { banner, formatRecommendation, formatRecovery, formatRegime } from "./format";

const LOOKBACK_YEARS = 2;

export async function runDiagnose(args: ParsedArgs, ctx: CommandContext): Promise<TickerAnalysis> {
  const [rawTicker] = args.positionals;
  if (!rawTicker) {
    throw new Error("Usage: diagnose <TICKER> [--model=conservative]");
  }
  const ticker = normalizeTicker(rawTicker);
  const preset = getModelPreset(stringOption(args, "model", "conservative"));

  ctx.print(`Analyzing ${ticker} (model: ${preset.name})`);

  const series = await loadSeries(ctx.provider, ticker, LOOKBACK_YEARS);
  const analysis = analyzeLatest(ticker, series, preset.config, {
    macdSignalSpan: macdSignalSpanOption(args),
  });

  for (const line of banner(`${ticker} @ ${analysis.date}`, 40)) ctx.print(line);
  ctx.print(`Close:          ${analysis.close.toFixed(2)}`);
  ctx.print(`Barometer:      ${formatRegime(analysis.regime)}`);
  ctx.print(`Recovery:       ${formatRecovery(analysis.recovery)}`);
  ctx.print(`Recommendation: ${formatRecommendation(analysis.recommendation)}`);
  if (analysis.regime === "INSUFFICIENT_DATA") {
    ctx.print(`Only ${series.length} bars available; the model needs more history.`);
  }

  return analysis;
}
