import type { OrderIntent, OrderResult, OrderSide } from '../../execution/types/execution.types.js';
import type { GridStrategyConfig } from '../strategy.types.js';
import { BaseStrategy } from './base.strategy.js';

interface OpenLevel {
  side: OrderSide;
  price: number;
  idempotencyKey: string;
}

// Removes float noise from reference ± k·spacing
function normalizePrice(price: number): number {
  return Math.round(price * 1e10) / 1e10;
}

// One resting order per price, whatever its side
function levelKey(price: number): string {
  return String(price);
}

/**
 * Resting limit orders at fixed spacing around a reference price. Levels at
 * or below the reference buy, levels above sell. A fill re-arms the grid
 * with the opposite side one spacing away, unless an order of either side
 * already rests at that price.
 */
export class GridStrategy extends BaseStrategy<GridStrategyConfig> {
  private readonly openLevels = new Map<string, OpenLevel>();
  private readonly levelByKey = new Map<string, string>();
  private fills = 0;

  override onStart(now: Date): OrderIntent[] {
    const { referencePrice, spacing, levels } = this.config;
    const intents: OrderIntent[] = [];

    for (let step = -levels; step <= levels; step++) {
      const price = normalizePrice(referencePrice + step * spacing);
      if (price <= 0) {
        continue;
      }
      const intent = this.placeLevel(step <= 0 ? 'BUY' : 'SELL', price, now);
      if (intent) {
        intents.push(intent);
      }
    }
    return intents;
  }

  override onEvent(): OrderIntent[] {
    return [];
  }

  override onResult(intent: OrderIntent, result: OrderResult, now: Date): OrderIntent[] {
    const key = this.levelByKey.get(intent.idempotencyKey);
    const level = key === undefined ? undefined : this.openLevels.get(key);
    if (key === undefined || !level) {
      return [];
    }

    switch (result.status) {
      case 'FILLED': {
        this.release(key, level);
        this.fills++;
        const counterSide: OrderSide = level.side === 'BUY' ? 'SELL' : 'BUY';
        const counterPrice = normalizePrice(
          level.side === 'BUY' ? level.price + this.config.spacing : level.price - this.config.spacing
        );
        if (counterPrice <= 0) {
          return [];
        }
        const counter = this.placeLevel(counterSide, counterPrice, now);
        if (!counter) {
          this.logger.debug({ side: counterSide, price: counterPrice }, 'Price level occupied, not duplicating');
          return [];
        }
        return [counter];
      }
      case 'REJECTED':
      case 'ERROR':
        this.release(key, level);
        this.logger.warn({ side: level.side, price: level.price, errorKind: result.errorKind }, 'Grid level order failed');
        return [];
      default:
        // Resting, partially filled or awaiting reconciliation: the level stays open
        return [];
    }
  }

  override describeState(): Record<string, unknown> {
    return {
      fills: this.fills,
      openLevels: [...this.openLevels.values()]
        .map(level => ({ side: level.side, price: level.price }))
        .sort((a, b) => a.price - b.price),
    };
  }

  private placeLevel(side: OrderSide, price: number, now: Date): OrderIntent | null {
    const key = levelKey(price);
    if (this.openLevels.has(key)) {
      return null;
    }

    const intent = this.createIntent(
      {
        symbol: this.config.symbol,
        side,
        kind: 'LIMIT',
        quantity: this.config.quantity,
        price,
        referencePrice: price,
      },
      now
    );
    this.openLevels.set(key, { side, price, idempotencyKey: intent.idempotencyKey });
    this.levelByKey.set(intent.idempotencyKey, key);
    return intent;
  }

  private release(key: string, level: OpenLevel): void {
    this.openLevels.delete(key);
    this.levelByKey.delete(level.idempotencyKey);
  }
}
