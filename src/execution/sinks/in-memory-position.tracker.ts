/**
 * Local position book built from fills reported back by the coordinator.
 */

import { signedQuantity } from '../order-intent.js';
import type { PositionTracker, TrackedPosition } from '../interfaces/index.js';
import type { OrderIntent, OrderResult } from '../types/execution.types.js';

const EPSILON = 1e-9;

export class InMemoryPositionTracker implements PositionTracker {
  private readonly positions = new Map<string, TrackedPosition>();

  async recordFill(intent: OrderIntent, result: OrderResult): Promise<void> {
    const filled = result.filledQuantity ?? 0;
    if (filled <= 0 || result.filledPrice === undefined) {
      return;
    }

    const key = positionKey(intent.venueId, intent.symbol);
    const current = this.positions.get(key) ?? {
      venueId: intent.venueId,
      symbol: intent.symbol,
      quantity: 0,
      averagePrice: 0,
      realizedPnl: 0,
    };
    this.positions.set(key, applyFill(current, signedQuantity(intent.side, filled), result.filledPrice));
  }

  getPosition(venueId: string, symbol: string): TrackedPosition | undefined {
    return this.positions.get(positionKey(venueId, symbol));
  }

  listPositions(): TrackedPosition[] {
    return [...this.positions.values()];
  }
}

function positionKey(venueId: string, symbol: string): string {
  return `${venueId}:${symbol}`;
}

function applyFill(position: TrackedPosition, fill: number, price: number): TrackedPosition {
  const { quantity, averagePrice } = position;
  const resulting = quantity + fill;

  // Opening or adding
  if (Math.abs(quantity) < EPSILON || Math.sign(quantity) === Math.sign(fill)) {
    return {
      ...position,
      quantity: resulting,
      averagePrice: (Math.abs(quantity) * averagePrice + Math.abs(fill) * price) / Math.abs(resulting),
    };
  }

  const closed = Math.min(Math.abs(fill), Math.abs(quantity));
  const realizedPnl = position.realizedPnl + closed * (price - averagePrice) * Math.sign(quantity);

  if (Math.abs(resulting) < EPSILON) {
    return { ...position, quantity: 0, averagePrice: 0, realizedPnl };
  }
  const flipped = Math.sign(resulting) !== Math.sign(quantity);
  return {
    ...position,
    quantity: resulting,
    averagePrice: flipped ? price : averagePrice,
    realizedPnl,
  };
}
