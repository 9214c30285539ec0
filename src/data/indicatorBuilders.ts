import { ModelConfig, bollingerSettings } from "../config/config";
import { Bar, IndicatorRow } from "../types";
import { adx, bollinger, drawdown, macd, rsi, sma } from "./indicators";

export type MacdSignalSpan = "signal" | "fast";

export interface IndicatorBuildOptions {
  /**
   * Which span smooths the MACD signal line. "fast" reproduces an older
   * variant of the tools that reused `macdFast`; keep "signal" otherwise.
   */
  macdSignalSpan?: MacdSignalSpan;
}

function defined(value: number): number | undefined {
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Build one IndicatorRow per bar from the series and model config.
 * This is the project-specific adapter on top of the generic indicator series:
 * every warm-up NaN becomes an explicit `undefined`.
 */
export function buildIndicatorRows(
  series: Bar[],
  config: ModelConfig,
  options: IndicatorBuildOptions = {}
): IndicatorRow[] {
  const closes = series.map((b) => b.close);
  const signalSpan = options.macdSignalSpan === "fast" ? config.macdFast : config.macdSignal;

  const maShortSeries = sma(closes, config.maShort);
  const maLongSeries = sma(closes, config.maLong);
  const rsiSeries = rsi(closes, config.rsiWindow);
  const macdSeries = macd(closes, config.macdFast, config.macdSlow, signalSpan);
  const drawdownSeries = drawdown(closes, config.drawdownWindow);
  const { adx: adxSeries, plusDI, minusDI } = adx(series, config.adxPeriod);

  const bb = bollingerSettings(config);
  const bands = bb ? bollinger(closes, bb.window, bb.stdDev) : undefined;

  return series.map((bar, i) => {
    const row: IndicatorRow = {
      date: bar.date,
      close: bar.close,

      maShort: defined(maShortSeries[i]),
      maLong: defined(maLongSeries[i]),

      rsi: defined(rsiSeries[i]),
      macd: defined(macdSeries.macd[i]),
      macdSignal: defined(macdSeries.signal[i]),
      macdHist: defined(macdSeries.histogram[i]),

      drawdown: defined(drawdownSeries[i]),

      adx: defined(adxSeries[i]),
      plusDI: defined(plusDI[i]),
      minusDI: defined(minusDI[i]),
    };

    if (bands) {
      row.bbMiddle = defined(bands.middle[i]);
      row.bbUpper = defined(bands.upper[i]);
      row.bbLower = defined(bands.lower[i]);
    }

    return row;
  });
}
