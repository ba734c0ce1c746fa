import { EmaTracker } from '../../indicators/ema.indicator.js';
import type { OrderIntent, OrderResult, OrderSide } from '../../execution/types/execution.types.js';
import type { StrategyEvent, TrendStrategyConfig } from '../strategy.types.js';
import { BaseStrategy } from './base.strategy.js';

interface TrendPosition {
  side: OrderSide;
  quantity: number;
  entryPrice: number;
  /** Only ever moves in the position's favour */
  trailingStop: number;
}

function opposite(side: OrderSide): OrderSide {
  return side === 'BUY' ? 'SELL' : 'BUY';
}

/**
 * Enters on a fast/slow EMA cross and exits when price breaches a trailing
 * stop. Crosses are ignored while a position is open.
 */
export class TrendFollowingStrategy extends BaseStrategy<TrendStrategyConfig> {
  private readonly fast: EmaTracker;
  private readonly slow: EmaTracker;
  private previousSpread: number | undefined;
  private position: TrendPosition | null = null;
  private pendingEntry: string | null = null;
  private pendingExit: string | null = null;

  constructor(config: TrendStrategyConfig) {
    super(config);
    this.fast = new EmaTracker(config.fastPeriod);
    this.slow = new EmaTracker(config.slowPeriod);
  }

  get trailingStop(): number | undefined {
    return this.position?.trailingStop;
  }

  override onEvent(event: Exclude<StrategyEvent, { type: 'EXECUTION' }>, now: Date): OrderIntent[] {
    if (this.haltReason !== null || event.type !== 'TICK' || event.tick.symbol !== this.config.symbol) {
      return [];
    }

    const { price } = event.tick;
    const fast = this.fast.update(price);
    const slow = this.slow.update(price);

    if (this.position && this.pendingExit === null) {
      const exit = this.trail(this.position, price, now);
      if (exit) {
        return [exit];
      }
    }

    if (fast === undefined || slow === undefined) {
      return [];
    }

    const spread = fast - slow;
    const previous = this.previousSpread;
    this.previousSpread = spread;
    if (previous === undefined || this.position || this.pendingEntry !== null) {
      return [];
    }

    let side: OrderSide | null = null;
    if (previous <= 0 && spread > 0) {
      side = 'BUY';
    } else if (previous >= 0 && spread < 0) {
      side = 'SELL';
    }
    if (!side) {
      return [];
    }

    const intent = this.createIntent(
      { symbol: this.config.symbol, side, kind: 'MARKET', quantity: this.config.quantity, referencePrice: price },
      now
    );
    this.pendingEntry = intent.idempotencyKey;
    this.logger.info({ side, fast, slow, price }, 'EMA cross, entering');
    return [intent];
  }

  override onResult(intent: OrderIntent, result: OrderResult): OrderIntent[] {
    if (intent.idempotencyKey === this.pendingEntry) {
      this.pendingEntry = null;
      this.handleEntryResult(intent, result);
    } else if (intent.idempotencyKey === this.pendingExit) {
      this.pendingExit = null;
      this.handleExitResult(intent, result);
    }
    return [];
  }

  override describeState(): Record<string, unknown> {
    return {
      fastEma: this.fast.value,
      slowEma: this.slow.value,
      position: this.position ? { ...this.position } : null,
    };
  }

  private trail(position: TrendPosition, price: number, now: Date): OrderIntent | null {
    const { trailingDistance } = this.config;
    const isLong = position.side === 'BUY';
    const breached = isLong ? price <= position.trailingStop : price >= position.trailingStop;

    if (breached) {
      const exit = this.createIntent(
        {
          symbol: this.config.symbol,
          side: opposite(position.side),
          kind: 'MARKET',
          quantity: position.quantity,
          referencePrice: price,
        },
        now
      );
      this.pendingExit = exit.idempotencyKey;
      this.logger.info({ price, trailingStop: position.trailingStop }, 'Trailing stop breached, exiting');
      return exit;
    }

    position.trailingStop = isLong
      ? Math.max(position.trailingStop, price - trailingDistance)
      : Math.min(position.trailingStop, price + trailingDistance);
    return null;
  }

  private handleEntryResult(intent: OrderIntent, result: OrderResult): void {
    switch (result.status) {
      case 'FILLED':
      case 'PARTIALLY_FILLED':
      case 'ACCEPTED': {
        const entryPrice = result.filledPrice ?? intent.referencePrice ?? 0;
        const { trailingDistance } = this.config;
        this.position = {
          side: intent.side,
          quantity: result.filledQuantity ?? intent.quantity,
          entryPrice,
          trailingStop: intent.side === 'BUY' ? entryPrice - trailingDistance : entryPrice + trailingDistance,
        };
        break;
      }
      case 'AMBIGUOUS':
        this.halt(`Entry ${intent.idempotencyKey} outcome unknown`);
        break;
      default:
        break;
    }
  }

  private handleExitResult(intent: OrderIntent, result: OrderResult): void {
    if (!this.position) {
      return;
    }
    switch (result.status) {
      case 'FILLED':
      case 'ACCEPTED':
        this.position = null;
        break;
      case 'PARTIALLY_FILLED': {
        const remaining = this.position.quantity - (result.filledQuantity ?? 0);
        this.position = remaining > 1e-9 ? { ...this.position, quantity: remaining } : null;
        break;
      }
      case 'AMBIGUOUS':
        this.halt(`Exit ${intent.idempotencyKey} outcome unknown`);
        break;
      default:
        // Rejected exits are retried on the next tick
        break;
    }
  }
}
