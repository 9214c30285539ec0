/**
 * Market barometer
 * Maps one indicator row to a regime label. Rules are evaluated in order and
 * the first match wins; reordering changes boundary outcomes.
 */

import { ModelConfig, bollingerSettings } from '../../config/config';
import { IndicatorRow, RegimeState } from '../../types';

function above(value: number | undefined, threshold: number): boolean {
  return value !== undefined && value > threshold;
}

function below(value: number | undefined, threshold: number): boolean {
  return value !== undefined && value < threshold;
}

export function classifyRegime(row: IndicatorRow, config: ModelConfig): RegimeState {
  const { close, maShort, maLong, rsi } = row;

  if (maShort === undefined || maLong === undefined) {
    return 'INSUFFICIENT_DATA';
  }

  const bandsOn = bollingerSettings(config) !== undefined;

  if (close > maShort && maShort > maLong && above(rsi, config.rsiBullThreshold)) {
    return bandsOn && row.bbUpper !== undefined && close > row.bbUpper
      ? 'SUNNY_OVERHEATED'
      : 'SUNNY';
  }

  if (close > maShort && close > maLong) {
    return 'CLOUDY_BRIGHT';
  }

  if ((maLong > close && close > maShort) || (maShort > close && close > maLong)) {
    return 'OVERCAST';
  }

  const underBoth = maShort > close && maLong > close;

  if (underBoth && below(rsi, config.rsiBearThreshold)) {
    return 'RAINY';
  }

  // Reachable only when rsiOversold >= rsiBearThreshold
  if (underBoth && below(rsi, config.rsiOversold)) {
    return bandsOn && row.bbLower !== undefined && close < row.bbLower
      ? 'TYPHOON_PANIC'
      : 'TYPHOON';
  }

  return 'OVERCAST';
}

/**
 * Regimes that count as "rain": the exit side of every strategy profile
 */
export function isBearishRegime(regime: RegimeState): boolean {
  return regime === 'RAINY' || regime === 'TYPHOON' || regime === 'TYPHOON_PANIC';
}
