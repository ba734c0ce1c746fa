import type { OrderIntent, OrderResult } from '../../execution/types/execution.types.js';
import type { MartingaleStrategyConfig, StrategyEvent } from '../strategy.types.js';
import { BaseStrategy } from './base.strategy.js';

type Phase =
  | { kind: 'IDLE' }
  | { kind: 'ENTERING'; idempotencyKey: string }
  | { kind: 'OPEN'; entryPrice: number; quantity: number; stopLoss: number; takeProfit: number };

/**
 * One position at a time with fixed stop and target distances. Each loss
 * scales the next size by `scaleFactor`; a win resets to level 1.
 */
export class MartingaleStrategy extends BaseStrategy<MartingaleStrategyConfig> {
  private level = 1;
  private cumulativeLoss = 0;
  private phase: Phase = { kind: 'IDLE' };

  /** base · factor^(level - 1) */
  get nextQuantity(): number {
    const { baseQuantity, scaleFactor } = this.config;
    return Number((baseQuantity * Math.pow(scaleFactor, this.level - 1)).toPrecision(12));
  }

  override onEvent(event: Exclude<StrategyEvent, { type: 'EXECUTION' }>, now: Date): OrderIntent[] {
    if (this.haltReason !== null || event.type !== 'TICK' || event.tick.symbol !== this.config.symbol) {
      return [];
    }

    const { price } = event.tick;
    if (this.phase.kind === 'OPEN') {
      this.evaluateOpenPosition(this.phase, price);
    }

    if (this.haltReason !== null || this.phase.kind !== 'IDLE') {
      return [];
    }
    return [this.enter(price, now)];
  }

  override onResult(intent: OrderIntent, result: OrderResult): OrderIntent[] {
    if (this.phase.kind !== 'ENTERING' || this.phase.idempotencyKey !== intent.idempotencyKey) {
      return [];
    }

    switch (result.status) {
      case 'FILLED':
      case 'PARTIALLY_FILLED':
      case 'ACCEPTED':
        this.phase = {
          kind: 'OPEN',
          entryPrice: result.filledPrice ?? intent.referencePrice ?? 0,
          quantity: result.filledQuantity ?? intent.quantity,
          stopLoss: intent.stopLoss ?? 0,
          takeProfit: intent.takeProfit ?? 0,
        };
        break;
      case 'AMBIGUOUS':
        this.halt(`Entry ${intent.idempotencyKey} outcome unknown`);
        break;
      default:
        this.phase = { kind: 'IDLE' };
    }
    return [];
  }

  override describeState(): Record<string, unknown> {
    return {
      level: this.level,
      nextQuantity: this.nextQuantity,
      cumulativeLoss: this.cumulativeLoss,
      phase: this.phase.kind,
    };
  }

  private enter(price: number, now: Date): OrderIntent {
    const { side, stopLossDistance, takeProfitDistance } = this.config;
    const isBuy = side === 'BUY';
    const intent = this.createIntent(
      {
        symbol: this.config.symbol,
        side,
        kind: 'MARKET',
        quantity: this.nextQuantity,
        referencePrice: price,
        stopLoss: isBuy ? price - stopLossDistance : price + stopLossDistance,
        takeProfit: isBuy ? price + takeProfitDistance : price - takeProfitDistance,
      },
      now
    );
    this.phase = { kind: 'ENTERING', idempotencyKey: intent.idempotencyKey };
    return intent;
  }

  private evaluateOpenPosition(position: Extract<Phase, { kind: 'OPEN' }>, price: number): void {
    const isBuy = this.config.side === 'BUY';
    const stopped = isBuy ? price <= position.stopLoss : price >= position.stopLoss;
    const targeted = isBuy ? price >= position.takeProfit : price <= position.takeProfit;

    if (stopped) {
      this.phase = { kind: 'IDLE' };
      this.recordLoss(Math.abs(position.entryPrice - position.stopLoss) * position.quantity);
    } else if (targeted) {
      this.phase = { kind: 'IDLE' };
      this.recordWin(Math.abs(position.takeProfit - position.entryPrice) * position.quantity);
    }
  }

  private recordLoss(loss: number): void {
    this.cumulativeLoss += loss;
    this.logger.info({ level: this.level, loss, cumulativeLoss: this.cumulativeLoss }, 'Martingale cycle lost');

    if (this.cumulativeLoss >= this.config.emergencyStopLoss) {
      this.halt(`Emergency stop: cumulative loss ${this.cumulativeLoss} reached ${this.config.emergencyStopLoss}`);
    } else if (this.level >= this.config.maxLevel) {
      this.halt(`Loss at maximum level ${this.config.maxLevel}`);
    } else {
      this.level++;
    }
  }

  private recordWin(profit: number): void {
    this.logger.info({ level: this.level, profit }, 'Martingale cycle won');
    this.level = 1;
    this.cumulativeLoss = Math.max(0, this.cumulativeLoss - profit);
  }
}
