/**
 * Scan command: holdings report plus market-wide entry/exit opportunities
 */

import { getModelPreset } from "../config/modelPresets";
import { buildScanList, buildScanReport, ScanReport, scanTickers, TickerScan } from "../services/scanService";
import { ParsedArgs, macdSignalSpanOption, stringOption } from "./args";
import { CommandContext } from "./context";
import { banner, formatCombined, formatRecommendation, formatRegime } from "./format";

const LOOKBACK_YEARS = 2;
// Models paired by --extend
const DUAL_MODELS = ["conservative", "highWinrate"] as const;

function describeScan(scan: TickerScan): string {
  const price = scan.close.toFixed(2).padStart(9);
  if (scan.analyses.length > 1) {
    const verdict = scan.combined ? formatCombined(scan.combined) : "no combined verdict (insufficient data)";
    const parts = scan.analyses.map((a, i) => `M${i + 1}: ${a.recommendation}`).join(", ");
    return `${scan.ticker.padEnd(10)} | ${price} | ${verdict} (${parts})`;
  }
  const [single] = scan.analyses;
  return `${scan.ticker.padEnd(10)} | ${price} | ${formatRegime(single.regime).padEnd(20)} | ${formatRecommendation(single.recommendation)}`;
}

export async function runScan(args: ParsedArgs, ctx: CommandContext): Promise<ScanReport> {
  const extend = args.flags.has("extend");
  const presets = extend
    ? DUAL_MODELS.map((name) => getModelPreset(name))
    : [getModelPreset(stringOption(args, "model", "conservative"))];

  const held = ctx.holdList.load();
  const tickers = buildScanList(held);

  for (const line of banner(`Market scan (${new Date().toISOString().slice(0, 10)})`)) ctx.print(line);
  ctx.print(`Mode: ${extend ? "dual model" : "single model"} (${presets.map((p) => p.name).join(" + ")})`);
  ctx.print(`Tickers: ${tickers.length}`);
  ctx.print("");

  const startedAt = Date.now();
  const outcomes = await scanTickers(
    ctx.provider,
    tickers,
    presets.map((p) => p.config),
    {
      years: LOOKBACK_YEARS,
      concurrency: ctx.settings.workers.count,
      timeoutMs: ctx.settings.workers.taskTimeoutMs,
      macdSignalSpan: macdSignalSpanOption(args),
    }
  );
  const report = buildScanReport(outcomes, held);

  for (const line of banner("💼 Holdings")) ctx.print(line);
  if (report.holdings.length === 0) {
    ctx.print("Hold list is empty.");
  }
  for (const holding of report.holdings) {
    ctx.print(holding.scan ? describeScan(holding.scan) : `${holding.ticker.padEnd(10)} | analysis failed: ${holding.error}`);
  }
  ctx.print("");

  for (const line of banner("🔍 Opportunities")) ctx.print(line);
  if (report.buys.length === 0 && report.sells.length === 0) {
    ctx.print("No new entry or exit signals in the scan list.");
  }
  if (report.buys.length > 0) {
    ctx.print("--- 🟢 Entry candidates ---");
    for (const scan of report.buys) ctx.print(describeScan(scan));
  }
  if (report.sells.length > 0) {
    ctx.print("--- 🔴 Exit / reduce candidates ---");
    for (const scan of report.sells) ctx.print(describeScan(scan));
  }

  ctx.print("");
  ctx.print(
    `Scan finished in ${((Date.now() - startedAt) / 1000).toFixed(1)}s ` +
    `(${report.failures.length} of ${tickers.length} tickers failed)`
  );

  return report;
}
