/**
 * Technical indicators calculation
 *
 * This module serves as a small, reusable indicator library:
 * - Low-level numeric APIs return full-length series with NaN for warm-up periods.
 * - It is intentionally decoupled from ModelConfig and project-specific data structures.
 *
 * EMA here is the recursive form seeded at the first defined value
 * (alpha = 2 / (span + 1)), not the SMA-seeded variant.
 */

import { Bar } from "../types";

export type HLCBar = Pick<Bar, "high" | "low" | "close">;

/**
 * Rolling arithmetic mean. NaN until `period` values have been seen.
 */
export function sma(values: number[], period: number): number[] {
  const out: number[] = new Array(values.length).fill(Number.NaN);
  let sum = 0;

  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= period) {
      sum -= values[i - period];
    }
    if (i >= period - 1) {
      out[i] = sum / period;
    }
  }

  return out;
}

/**
 * Rolling sample standard deviation (n - 1 denominator).
 */
export function rollingStd(values: number[], period: number): number[] {
  const out: number[] = new Array(values.length).fill(Number.NaN);
  if (period < 2) {
    return out;
  }

  for (let i = period - 1; i < values.length; i++) {
    let mean = 0;
    for (let j = i - period + 1; j <= i; j++) {
      mean += values[j];
    }
    mean /= period;

    let squares = 0;
    for (let j = i - period + 1; j <= i; j++) {
      squares += (values[j] - mean) ** 2;
    }
    out[i] = Math.sqrt(squares / (period - 1));
  }

  return out;
}

/**
 * Rolling maximum that needs a single sample, so it is defined from index 0.
 */
export function rollingMax(values: number[], period: number): number[] {
  const out: number[] = new Array(values.length);
  // Indices of candidate maxima, values decreasing from head to tail
  const window: number[] = [];
  let head = 0;

  for (let i = 0; i < values.length; i++) {
    while (window.length > head && values[window[window.length - 1]] <= values[i]) {
      window.pop();
    }
    window.push(i);
    if (window[head] <= i - period) {
      head++;
    }
    out[i] = values[window[head]];
  }

  return out;
}

/**
 * Exponential Moving Average (EMA) series.
 * Leading NaN inputs stay NaN; the first defined input seeds the average.
 * @param values Input price or value series
 * @param span Smoothing span
 */
export function ema(values: number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const emaSeries: number[] = [];

  let prevEma: number | undefined;

  for (const value of values) {
    if (prevEma === undefined) {
      if (!Number.isNaN(value)) {
        prevEma = value;
      }
    } else {
      prevEma = alpha * value + (1 - alpha) * prevEma;
    }
    emaSeries.push(prevEma ?? Number.NaN);
  }

  return emaSeries;
}

/**
 * Relative Strength Index with simple rolling means of gains and losses.
 * The first bar contributes a zero delta. Zero loss with positive gain gives
 * exactly 100; a window with neither gain nor loss stays NaN.
 */
export function rsi(closes: number[], period: number): number[] {
  const gains: number[] = closes.map((c, i) => (i === 0 ? 0 : Math.max(c - closes[i - 1], 0)));
  const losses: number[] = closes.map((c, i) => (i === 0 ? 0 : Math.max(closes[i - 1] - c, 0)));

  const avgGain = sma(gains, period);
  const avgLoss = sma(losses, period);

  return closes.map((_, i) => {
    const gain = avgGain[i];
    const loss = avgLoss[i];
    if (Number.isNaN(gain) || Number.isNaN(loss)) {
      return Number.NaN;
    }
    if (loss === 0) {
      return gain > 0 ? 100 : Number.NaN;
    }
    return 100 - 100 / (1 + gain / loss);
  });
}

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

/**
 * MACD line, signal line and histogram
 */
export function macd(closes: number[], fast: number, slow: number, signalSpan: number): MacdSeries {
  const fastEma = ema(closes, fast);
  const slowEma = ema(closes, slow);
  const line = closes.map((_, i) => fastEma[i] - slowEma[i]);
  const signal = ema(line, signalSpan);

  return {
    macd: line,
    signal,
    histogram: line.map((m, i) => m - signal[i]),
  };
}

/**
 * Fractional distance below the trailing peak over `period` bars (always <= 0)
 */
export function drawdown(closes: number[], period: number): number[] {
  const peaks = rollingMax(closes, period);
  return closes.map((c, i) => c / peaks[i] - 1);
}

/**
 * ADX and DI series as generic numeric series.
 * Directional movement is 0 on the first bar, so its EMA is seeded one bar
 * before TR, which needs a previous close. DI and ADX start on the second bar.
 * @param bars High/low/close series
 * @param period Smoothing span
 */
export function adx(
  bars: HLCBar[],
  period: number
): {
  adx: number[];
  plusDI: number[];
  minusDI: number[];
} {
  const len = bars.length;

  const plusDM: number[] = new Array(len).fill(0);
  const minusDM: number[] = new Array(len).fill(0);
  const trList: number[] = new Array(len).fill(Number.NaN);

  // 1️⃣ Calculate TR, +DM, -DM
  for (let i = 1; i < len; i++) {
    const curr = bars[i];
    const prev = bars[i - 1];

    const upMove = curr.high - prev.high;
    const downMove = prev.low - curr.low;

    plusDM[i] = upMove > downMove ? Math.max(upMove, 0) : 0;
    minusDM[i] = downMove > upMove ? Math.max(downMove, 0) : 0;

    trList[i] = Math.max(
      curr.high - curr.low,
      Math.abs(curr.high - prev.close),
      Math.abs(curr.low - prev.close)
    );
  }

  // 2️⃣ EMA smoothing for TR and DM
  const smoothedTR = ema(trList, period);
  const smoothedPlusDM = ema(plusDM, period);
  const smoothedMinusDM = ema(minusDM, period);

  // 3️⃣ +DI, -DI, DX
  const plusDI: number[] = new Array(len).fill(Number.NaN);
  const minusDI: number[] = new Array(len).fill(Number.NaN);
  const dx: number[] = new Array(len).fill(Number.NaN);

  for (let i = 1; i < len; i++) {
    const tr = smoothedTR[i];
    const pdi = tr === 0 ? 0 : (100 * smoothedPlusDM[i]) / tr;
    const mdi = tr === 0 ? 0 : (100 * smoothedMinusDM[i]) / tr;

    plusDI[i] = pdi;
    minusDI[i] = mdi;

    const sum = pdi + mdi;
    dx[i] = sum === 0 ? 0 : (100 * Math.abs(pdi - mdi)) / sum;
  }

  // 4️⃣ ADX
  return { adx: ema(dx, period), plusDI, minusDI };
}

export interface BollingerSeries {
  middle: number[];
  upper: number[];
  lower: number[];
}

export function bollinger(closes: number[], period: number, width: number): BollingerSeries {
  const middle = sma(closes, period);
  const std = rollingStd(closes, period);

  return {
    middle,
    upper: middle.map((m, i) => m + width * std[i]),
    lower: middle.map((m, i) => m - width * std[i]),
  };
}
