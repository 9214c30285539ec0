import { SignalBar, Trade } from '../../types';
import { logDebug } from '../../utils/logger';

/**
 * Records realized trades and compounds the capital multiplier.
 * Capital starts at 1.0 and only moves when a trade closes.
 */
export class TradeLogger {
  private trades: Trade[] = [];
  private capital: number = 1;
  private tag?: string;

  constructor(tag?: string) {
    this.tag = tag;
  }

  getCapital(): number {
    return this.capital;
  }

  getTrades(): Trade[] {
    return [...this.trades];
  }

  logEntry(bar: SignalBar) {
    logDebug('ENTRY', { date: bar.date, price: bar.close, regime: bar.regime }, this.tag);
  }

  logExit(trade: Trade) {
    this.capital *= 1 + trade.profitFraction;
    this.trades.push(trade);

    logDebug(
      'EXIT',
      {
        date: trade.exitDate,
        price: trade.exitPrice,
        profit: Number(trade.profitFraction.toFixed(4)),
        capital: Number(this.capital.toFixed(4)),
        reason: trade.reason,
      },
      this.tag
    );
  }
}
