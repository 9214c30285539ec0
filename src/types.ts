/* =========================================================
 * Market data
 * ========================================================= */

/**
 * One daily bar. `date` is an ISO calendar date (YYYY-MM-DD), unique and
 * strictly increasing within a series.
 */
export interface Bar {
  date: string;
  open?: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/* =========================================================
 * Indicator output
 * ========================================================= */

/**
 * Indicator snapshot for one bar.
 * Every derived field stays undefined until its lookback is satisfied.
 */
export interface IndicatorRow {
  date: string;
  close: number;

  // Trend
  maShort?: number;
  maLong?: number;

  // Momentum
  rsi?: number;
  macd?: number;
  macdSignal?: number;
  macdHist?: number;

  // Distance from the trailing peak (always <= 0)
  drawdown?: number;

  // Trend strength
  adx?: number;
  plusDI?: number;
  minusDI?: number;

  // Volatility bands (only when Bollinger is configured)
  bbMiddle?: number;
  bbUpper?: number;
  bbLower?: number;
}

/* =========================
 * Barometer & recovery
 * ========================= */

export type RegimeState =
  | "SUNNY"
  | "SUNNY_OVERHEATED"
  | "CLOUDY_BRIGHT"
  | "OVERCAST"
  | "RAINY"
  | "TYPHOON"
  | "TYPHOON_PANIC"
  | "INSUFFICIENT_DATA";

export type RecoverySignal = "TRIGGER" | "NONE" | "INSUFFICIENT_DATA";

export type Recommendation = "ENTER" | "EXIT" | "HOLD";

export type CombinedRecommendation =
  | "STRONG_BUY"
  | "BUY"
  | "HOLD"
  | "REDUCE"
  | "STRONG_SELL";

/**
 * Per-bar decision input for the position simulator.
 */
export interface SignalBar {
  date: string;
  close: number;
  regime: RegimeState;
  recovery: RecoverySignal;
}

/* =========================
 * Position State Machine
 * ========================= */

export type PositionState = "FLAT" | "LONG";

export interface Position {
  entryPrice: number;
  entryDate: string;
}

export type TradeReason = "REGIME_EXIT" | "END_OF_DATA";

export interface Trade {
  entryDate: string;
  entryPrice: number;
  exitDate: string;
  exitPrice: number;
  profitFraction: number;
  reason: TradeReason;
}

/* =========================================================
 * Simulation & analytics
 * ========================================================= */

export interface SimulationResult {
  trades: Trade[];
  finalCapital: number;
  // Capital multiplier after each bar (mark-to-trade)
  equityCurve: number[];
  // One close-to-close return per step after bar 0: non-zero when LONG going into the bar
  dailyReturns: number[];
  endedLong: boolean;
}

export interface PerformanceStats {
  totalReturn: number;
  winRate: number;
  annualizedReturn: number;
  sharpeRatio: number;
  maxDrawdown: number;
  totalTrades: number;
  winningTrades: number;
}

export interface BacktestResult {
  ticker: string;
  startDate: string;
  endDate: string;
  barCount: number;
  buyAndHoldReturn: number;
  simulation: SimulationResult;
  stats: PerformanceStats;
}

/* =========================================================
 * Analysis output
 * ========================================================= */

export interface TickerAnalysis {
  ticker: string;
  date: string;
  close: number;
  regime: RegimeState;
  recovery: RecoverySignal;
  recommendation: Recommendation;
}

/**
 * Outcome of one per-ticker unit of work. Failures carry the message only.
 */
export type TickerOutcome<T> =
  | { ticker: string; ok: true; value: T }
  | { ticker: string; ok: false; error: string };
