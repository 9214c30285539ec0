/**
 * "Cleared skies" recovery detector
 * Fires when a drawdown is deep yet improving, confirmed by positive MACD
 * momentum and a strong, bullish-directed trend.
 */

import { ModelConfig } from '../../config/config';
import { IndicatorRow, RecoverySignal } from '../../types';

export function detectRecovery(
  current: IndicatorRow,
  previous: IndicatorRow | undefined,
  config: ModelConfig
): RecoverySignal {
  const { macdHist, drawdown, adx, plusDI, minusDI } = current;

  if (
    macdHist === undefined ||
    drawdown === undefined ||
    adx === undefined ||
    plusDI === undefined ||
    minusDI === undefined
  ) {
    return 'INSUFFICIENT_DATA';
  }

  const previousDrawdown = previous?.drawdown ?? 0;

  const deepEnough = drawdown <= config.drawdownNoRain;
  const improving = drawdown > previousDrawdown;
  const bullishMomentum = macdHist > 0;
  const strongTrend = adx > config.adxThreshold;
  const bullishDirection = plusDI > minusDI;

  return deepEnough && improving && bullishMomentum && strongTrend && bullishDirection
    ? 'TRIGGER'
    : 'NONE';
}
