/**
 * Position state machine
 * FLAT -> LONG on OPEN_POSITION, LONG -> FLAT on CLOSE_POSITION.
 * Holds at most one open position.
 */

import { Position, PositionState, Trade, TradeReason } from '../../types';

export type PositionAction =
  | {
      type: 'OPEN_POSITION';
      payload: { entryPrice: number; entryDate: string };
    }
  | {
      type: 'CLOSE_POSITION';
      payload: { exitPrice: number; exitDate: string };
      reason: TradeReason;
    };

export class PositionStore {
  private state: PositionState = 'FLAT';
  private position: Position | null = null;
  private lastTrade: Trade | null = null;

  getState(): PositionState {
    return this.state;
  }

  /**
   * Trade realized by the most recent CLOSE_POSITION
   */
  getLastTrade(): Trade | null {
    return this.lastTrade;
  }

  dispatch(action: PositionAction): void {
    switch (action.type) {
      case 'OPEN_POSITION': {
        if (this.state !== 'FLAT' || this.position) {
          throw new Error('Position already exists or state is not FLAT');
        }
        if (!(action.payload.entryPrice > 0)) {
          throw new Error(`Invalid entry price: ${action.payload.entryPrice}`);
        }
        this.position = { ...action.payload };
        this.state = 'LONG';
        break;
      }

      case 'CLOSE_POSITION': {
        if (this.state !== 'LONG' || !this.position) {
          throw new Error('No open position to close');
        }
        const { entryPrice, entryDate } = this.position;
        const { exitPrice, exitDate } = action.payload;
        if (exitDate <= entryDate) {
          throw new Error(`Exit date ${exitDate} must be after entry date ${entryDate}`);
        }

        this.lastTrade = {
          entryDate,
          entryPrice,
          exitDate,
          exitPrice,
          profitFraction: (exitPrice - entryPrice) / entryPrice,
          reason: action.reason,
        };
        this.position = null;
        this.state = 'FLAT';
        break;
      }
    }
  }
}
