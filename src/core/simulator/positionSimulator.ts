/**
 * Position simulator
 * Walks the date-ordered signal bars with a FLAT/LONG state machine.
 * Entry on a recovery TRIGGER, exit on a regime from the profile's exit set,
 * forced close-out on the last bar when still LONG.
 */

import { SignalBar, SimulationResult, TradeReason } from '../../types';
import { PositionStore } from '../state/positionStore';
import { TradeLogger } from '../logger/tradeLogger';
import { StrategyProfile } from '../strategy/strategyProfiles';

export interface SimulationOptions {
  // Tag for debug logging, usually the ticker
  tag?: string;
}

export function simulatePositions(
  bars: SignalBar[],
  profile: StrategyProfile,
  options: SimulationOptions = {}
): SimulationResult {
  const store = new PositionStore();
  const tradeLogger = new TradeLogger(options.tag);

  const equityCurve: number[] = [];
  const dailyReturns: number[] = [];
  const lastIndex = bars.length - 1;

  bars.forEach((bar, i) => {
    // One return per step from the previous bar; bar 0 has none
    if (i > 0) {
      dailyReturns.push(store.getState() === 'LONG' ? bar.close / bars[i - 1].close - 1 : 0);
    }

    if (store.getState() === 'FLAT') {
      // No entry on the final bar: it could never be closed after itself
      const canEnter =
        bar.recovery === 'TRIGGER' && !profile.entryBlockRegimes.has(bar.regime) && i < lastIndex;
      if (canEnter) {
        store.dispatch({
          type: 'OPEN_POSITION',
          payload: { entryPrice: bar.close, entryDate: bar.date },
        });
        tradeLogger.logEntry(bar);
      }
    } else if (profile.exitRegimes.has(bar.regime)) {
      closePosition(store, tradeLogger, bar, 'REGIME_EXIT');
    }

    equityCurve.push(tradeLogger.getCapital());
  });

  const endedLong = store.getState() === 'LONG';
  if (endedLong) {
    closePosition(store, tradeLogger, bars[lastIndex], 'END_OF_DATA');
    equityCurve[lastIndex] = tradeLogger.getCapital();
  }

  return {
    trades: tradeLogger.getTrades(),
    finalCapital: tradeLogger.getCapital(),
    equityCurve,
    dailyReturns,
    endedLong,
  };
}

function closePosition(
  store: PositionStore,
  tradeLogger: TradeLogger,
  bar: SignalBar,
  reason: TradeReason
): void {
  store.dispatch({
    type: 'CLOSE_POSITION',
    payload: { exitPrice: bar.close, exitDate: bar.date },
    reason,
  });
  const trade = store.getLastTrade();
  if (trade) {
    tradeLogger.logExit(trade);
  }
}
