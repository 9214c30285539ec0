import { CombinedRecommendation, Recommendation, RecoverySignal, RegimeState } from '../../types';
import { isBearishRegime } from './barometer';

/**
 * Turn the latest regime and recovery labels into an action.
 * A recovery trigger outranks a bearish regime on the same bar.
 */
export function recommend(regime: RegimeState, recovery: RecoverySignal): Recommendation {
  if (recovery === 'TRIGGER') {
    return 'ENTER';
  }
  if (isBearishRegime(regime)) {
    return 'EXIT';
  }
  return 'HOLD';
}

export function recommendationScore(recommendation: Recommendation): number {
  switch (recommendation) {
    case 'ENTER':
      return 1;
    case 'EXIT':
      return -1;
    case 'HOLD':
      return 0;
  }
}

/**
 * Combine two models' recommendations by summing their scores
 */
export function combineRecommendations(
  primary: Recommendation,
  secondary: Recommendation
): CombinedRecommendation {
  const score = recommendationScore(primary) + recommendationScore(secondary);
  if (score >= 2) return 'STRONG_BUY';
  if (score === 1) return 'BUY';
  if (score === 0) return 'HOLD';
  if (score === -1) return 'REDUCE';
  return 'STRONG_SELL';
}
