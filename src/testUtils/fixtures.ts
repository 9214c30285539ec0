/**
 * Test fixtures shared by unit tests
 */

import { ModelConfig, validateModelConfig } from "../config/config";
import { MarketDataProvider } from "../data/fetcher";
import { Bar, IndicatorRow, SignalBar } from "../types";
import { DataFetchError } from "../utils/errors";

/**
 * YYYY-MM-DD for day `i` counted from 2020-01-01
 */
export function dayDate(i: number): string {
  return new Date(Date.UTC(2020, 0, 1 + i)).toISOString().slice(0, 10);
}

/**
 * Bars from closes, with a fixed +/-1 high/low band
 */
export function barsFromCloses(closes: number[]): Bar[] {
  return closes.map((close, i) => ({
    date: dayDate(i),
    open: close,
    high: close + 1,
    low: Math.max(close - 1, close / 2),
    close,
    volume: 1000,
  }));
}

export function signalBar(i: number, close: number, overrides: Partial<SignalBar> = {}): SignalBar {
  return {
    date: dayDate(i),
    close,
    regime: "CLOUDY_BRIGHT",
    recovery: "NONE",
    ...overrides,
  };
}

export function row(overrides: Partial<IndicatorRow> = {}): IndicatorRow {
  return { date: "2020-01-01", close: 100, ...overrides };
}

export const baseConfig: ModelConfig = validateModelConfig(
  {
    maShort: 3,
    maLong: 5,
    rsiWindow: 3,
    rsiOversold: 30,
    rsiBullThreshold: 50,
    rsiBearThreshold: 40,
    macdFast: 2,
    macdSlow: 4,
    macdSignal: 3,
    drawdownWindow: 5,
    drawdownNoRain: -0.1,
    adxPeriod: 3,
    adxThreshold: 20,
  },
  "test"
);

export function withConfig(overrides: Record<string, number>): ModelConfig {
  return validateModelConfig({ ...baseConfig, ...overrides }, "test");
}

/**
 * In-process provider: serves fixed series, fails unknown tickers
 */
export class FakeProvider implements MarketDataProvider {
  readonly calls: string[] = [];

  constructor(private readonly data: Record<string, Bar[]>) {}

  async fetchDailyBars(ticker: string): Promise<Bar[]> {
    this.calls.push(ticker);
    const bars = this.data[ticker];
    if (!bars) {
      throw new DataFetchError(ticker, "no data returned");
    }
    return bars;
  }
}
