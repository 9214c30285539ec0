import { CombinedRecommendation, Recommendation, RecoverySignal, RegimeState } from "../types";

const REGIME_ICONS: Record<RegimeState, string> = {
  SUNNY: "☀️",
  SUNNY_OVERHEATED: "🔥",
  CLOUDY_BRIGHT: "🌥️",
  OVERCAST: "☁️",
  RAINY: "🌧️",
  TYPHOON: "⛈️",
  TYPHOON_PANIC: "🌪️",
  INSUFFICIENT_DATA: "❔",
};

export function formatRegime(regime: RegimeState): string {
  return `${REGIME_ICONS[regime]} ${regime}`;
}

export function formatRecovery(recovery: RecoverySignal): string {
  return recovery === "TRIGGER" ? "🌤️ CLEARED SKIES" : recovery;
}

const RECOMMENDATION_TEXT: Record<Recommendation, string> = {
  ENTER: "🟢 ENTER",
  EXIT: "🔴 EXIT / STAY FLAT",
  HOLD: "🟡 HOLD / WAIT",
};

export function formatRecommendation(recommendation: Recommendation): string {
  return RECOMMENDATION_TEXT[recommendation];
}

const COMBINED_TEXT: Record<CombinedRecommendation, string> = {
  STRONG_BUY: "💎 STRONG BUY",
  BUY: "🟢 BUY",
  HOLD: "🟡 HOLD",
  REDUCE: "🟠 REDUCE",
  STRONG_SELL: "🔴 STRONG SELL",
};

export function formatCombined(combined: CombinedRecommendation): string {
  return COMBINED_TEXT[combined];
}

export function banner(title: string, width: number = 60): string[] {
  return ["=".repeat(width), title, "=".repeat(width)];
}
